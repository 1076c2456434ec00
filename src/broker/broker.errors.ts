/** The broker could not be reached or the channel could not be set up. */
export class BrokerConnectionError extends Error {
  readonly kind = 'connection';

  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = BrokerConnectionError.name;
  }
}

/** A connected channel failed to take or confirm the messages. */
export class PublishError extends Error {
  readonly kind = 'publish';

  constructor(
    message: string,
    readonly routingKeys: readonly string[],
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = PublishError.name;
  }
}

export type PublishFailure = BrokerConnectionError | PublishError;
