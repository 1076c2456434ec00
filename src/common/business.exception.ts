import { HttpStatus } from '@nestjs/common';

export type ErrorDomain = 'shipping-api' | 'order-events' | 'generic';

export class BusinessException extends Error {
  public readonly id: string;
  public readonly timestamp: Date;

  constructor(
    public readonly domain: ErrorDomain,
    public readonly message: string,
    public readonly apiMessage: string,
    public readonly status: HttpStatus,
  ) {
    super(message);
    this.name = new.target.name;
    this.id = BusinessException.genId();
    this.timestamp = new Date();
  }

  private static genId(length = 16): string {
    const p = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
    return [...Array(length)].reduce<string>((a) => a + p[~~(Math.random() * p.length)], '');
  }
}
