import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { isRecord } from '../utils/types';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const message = this.resolveMessage(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed: ${
          exception instanceof Error ? exception.message : String(exception)
        }`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const code = this.resolveCode(exception);

    void reply.status(status).send({
      statusCode: status,
      message,
      ...(code ? { code } : {}),
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }

  private resolveMessage(exception: unknown): string | string[] {
    if (!(exception instanceof HttpException)) {
      return 'Internal server error';
    }

    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if (isRecord(response)) {
      const message = response.message;
      if (typeof message === 'string') return message;
      if (Array.isArray(message)) {
        return message.filter((item): item is string => typeof item === 'string');
      }
    }
    return exception.message;
  }

  /** Machine-readable reason some 4xx responses carry next to the message. */
  private resolveCode(exception: unknown): string | null {
    if (!(exception instanceof HttpException)) return null;
    const response = exception.getResponse();
    return isRecord(response) && typeof response.code === 'string' ? response.code : null;
  }
}
