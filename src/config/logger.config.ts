import { LoggerService } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { format, transports } from 'winston';
import 'winston-daily-rotate-file';

/** Console plus daily rotated JSON files, one pair per process kind. */
export function createAppLogger(processName: 'api' | 'consumer'): LoggerService {
  const isDevelopment = process.env.NODE_ENV === 'develop';

  return WinstonModule.createLogger({
    level: isDevelopment ? 'debug' : 'info',
    transports: [
      new transports.DailyRotateFile({
        filename: `logs/%DATE%-${processName}-error.log`,
        level: 'error',
        format: format.combine(format.timestamp(), format.json()),
        datePattern: 'DD-MM-YYYY',
        zippedArchive: false,
      }),
      new transports.DailyRotateFile({
        filename: `logs/%DATE%-${processName}-combined.log`,
        format: format.combine(format.timestamp(), format.json()),
        datePattern: 'DD-MM-YYYY',
        zippedArchive: false,
      }),
      new transports.Console({
        format: format.combine(
          format.cli(),
          format.splat(),
          format.timestamp(),
          format.printf((info) => {
            const context = typeof info.context === 'string' ? ` [${info.context}]` : '';
            return `${info.timestamp} ${info.level}:${context} ${info.message}`;
          }),
        ),
      }),
    ],
  });
}
