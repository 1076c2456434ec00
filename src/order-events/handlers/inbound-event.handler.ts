import { HttpStatus } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { BusinessException } from '../../common/business.exception';
import { InboundEventKind } from '../inbound-event';

export interface InboundEventHandler {
  readonly kind: InboundEventKind;
  /** Must be safe to run again for the same payload; throwing gets the message redelivered. */
  handle(payload: unknown): Promise<void>;
}

export class MalformedEventException extends BusinessException {
  constructor(kind: InboundEventKind, detail: string) {
    super('order-events', `Malformed ${kind} payload: ${detail}`, 'Malformed event payload', HttpStatus.UNPROCESSABLE_ENTITY);
  }
}

export async function toValidatedPayload<T extends object>(
  kind: InboundEventKind,
  dto: ClassConstructor<T>,
  payload: unknown,
): Promise<T> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedEventException(kind, 'expected a JSON object');
  }

  const instance = plainToInstance(dto, payload);
  const errors = await validate(instance);
  if (errors.length > 0) {
    const detail = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new MalformedEventException(kind, detail);
  }

  return instance;
}
