import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { GameError, InvalidInputError } from '../errors/game-errors.js';
import { formatZodIssues } from '../pipes/zod-validation.pipe.js';

function httpMessage(body: string | object): string {
  if (typeof body === 'string') return body;
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.join(', ');
  }
  return 'Unknown error';
}

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    // 컨트롤러의 Schema.parse 실패
    if (exception instanceof ZodError) {
      exception = new InvalidInputError('Validation failed', {
        issues: formatZodIssues(exception.issues),
      });
    }

    if (exception instanceof GameError) {
      if (exception.httpStatus >= 500) {
        this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
      }
      res.status(exception.httpStatus).json({
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      res.status(status).json({
        code: 'HTTP_ERROR',
        message: httpMessage(body),
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  }
}
