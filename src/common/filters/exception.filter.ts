import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { BusinessException, ErrorDomain } from '../business.exception';

export interface ApiError {
  id: string;
  domain: ErrorDomain;
  message: string | string[];
  timestamp: Date;
}

@Catch()
export class CustomExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(CustomExceptionFilter.name);

  catch(exception: Error, host: ArgumentsHost) {
    let body: ApiError;
    let status: HttpStatus;

    if (exception instanceof BusinessException) {
      body = {
        id: exception.id,
        domain: exception.domain,
        message: exception.apiMessage,
        timestamp: exception.timestamp,
      };
      status = exception.status;
    } else if (exception instanceof HttpException) {
      const generic = new BusinessException('generic', exception.message, exception.message, exception.getStatus());
      body = {
        id: generic.id,
        domain: generic.domain,
        message: CustomExceptionFilter.messageOf(exception),
        timestamp: generic.timestamp,
      };
      status = exception.getStatus();
    } else {
      const generic = new BusinessException(
        'generic',
        `Internal error: ${exception.message}`,
        'Internal error',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
      body = {
        id: generic.id,
        domain: generic.domain,
        message: generic.apiMessage,
        timestamp: generic.timestamp,
      };
      status = HttpStatus.INTERNAL_SERVER_ERROR;
    }

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`Got an exception: ${JSON.stringify({ ...body, detail: exception.message })}`, exception.stack);
    } else {
      this.logger.warn(`Got an exception: ${JSON.stringify(body)}`);
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(status).json(body);
  }

  /** ValidationPipe reports each failed constraint in `message`. */
  private static messageOf(exception: HttpException): string | string[] {
    const response = exception.getResponse();
    if (typeof response === 'object' && 'message' in response) {
      const { message } = response;
      if (typeof message === 'string') return message;
      if (Array.isArray(message) && message.every((item): item is string => typeof item === 'string')) {
        return message;
      }
    }
    return exception.message;
  }
}
