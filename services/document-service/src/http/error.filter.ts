import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import type { CorrelatedRequest } from './correlation';
import { ApiErrorResponse, isServiceError, Logger } from '@medidoc/shared';
import { isRecord } from '../guards';

interface RenderedError {
  status: number;
  code: string;
  message: string;
}

const codeForStatus = (status: number): string => {
  if (status === HttpStatus.NOT_FOUND) return 'NOT_FOUND';
  if (status === HttpStatus.PAYLOAD_TOO_LARGE) return 'PAYLOAD_TOO_LARGE';
  if (status >= 500) return 'INTERNAL_ERROR';
  return 'VALIDATION_ERROR';
};

/** Fastify plugin errors (multipart limits and the like) carry a numeric statusCode. */
const clientStatusOf = (exception: unknown): number | undefined => {
  if (!isRecord(exception)) return undefined;
  const status = exception.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

export function renderError(exception: unknown): RenderedError {
  if (isServiceError(exception)) {
    return { status: exception.status, code: exception.code, message: exception.clientMessage };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    return {
      status,
      code: codeForStatus(status),
      message: status >= 500 ? 'Internal server error' : exception.message,
    };
  }

  const clientStatus = clientStatusOf(exception);
  if (clientStatus !== undefined && exception instanceof Error) {
    return { status: clientStatus, code: codeForStatus(clientStatus), message: exception.message };
  }

  return { status: HttpStatus.INTERNAL_SERVER_ERROR, code: 'INTERNAL_ERROR', message: 'Internal server error' };
}

/** Renders every failure as `{ success: false, error: { code, message }, correlationId }`. */
@Catch()
export class ErrorEnvelopeFilter implements ExceptionFilter {
  constructor(private readonly logger: Logger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<CorrelatedRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const rendered = renderError(exception);
    // ServiceErrors are logged where they are raised.
    if (rendered.status >= 500 && !isServiceError(exception)) {
      this.logger.error('Request failed', exception, {
        correlationId: req.correlationId,
        method: req.method,
        url: req.url,
        code: rendered.code,
      });
    }

    const body: ApiErrorResponse = {
      success: false,
      error: { code: rendered.code, message: rendered.message },
      correlationId: req.correlationId,
    };

    void reply.status(rendered.status).send(body);
  }
}
