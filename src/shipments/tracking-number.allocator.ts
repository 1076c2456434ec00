import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { randomInt } from 'crypto';
import { Repository } from 'typeorm';
import { AppConfig } from '../config/config';
import { Shipment } from '../entities/shipment.entity';
import { isUniqueViolation } from '../utils/unique-violation.utils';
import { AllocationExhaustedException } from './shipment.exceptions';

export const TRACKING_NUMBER_PREFIX = 'TRK';
export const TRACKING_NUMBER_PATTERN = /^TRK\d{4}$/;

const MIN_CODE = 1000;
const MAX_CODE = 9999;

@Injectable()
export class TrackingNumberAllocator {
  private readonly logger = new Logger(TrackingNumberAllocator.name);
  private readonly maxAttempts: number;

  constructor(
    @InjectRepository(Shipment)
    private readonly shipmentRepository: Repository<Shipment>,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.maxAttempts = configService.get('shipping.trackingNumberMaxAttempts', { infer: true });
  }

  candidate(): string {
    return `${TRACKING_NUMBER_PREFIX}${randomInt(MIN_CODE, MAX_CODE + 1)}`;
  }

  /**
   * Reserves a free tracking number by handing candidates to `persist`, the write that
   * carries the unique constraint on `tracking_no`. Candidates already stored are skipped
   * without calling `persist`; a unique violation raised by `persist` (a concurrent writer
   * took the same code) counts as a collision. Both consume an attempt.
   */
  async allocate<T>(persist: (trackingNo: string) => Promise<T>): Promise<T> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const trackingNo = this.candidate();

      if (await this.isTaken(trackingNo)) {
        continue;
      }

      try {
        return await persist(trackingNo);
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }
        this.logger.warn(`Tracking number ${trackingNo} was taken concurrently (attempt ${attempt}/${this.maxAttempts})`);
      }
    }

    this.logger.error(`No free tracking number found after ${this.maxAttempts} attempts`);
    throw new AllocationExhaustedException(this.maxAttempts);
  }

  private async isTaken(trackingNo: string): Promise<boolean> {
    const count = await this.shipmentRepository.countBy({ trackingNo });
    return count > 0;
  }
}
