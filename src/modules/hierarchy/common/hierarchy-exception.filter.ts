import { ArgumentsHost, Catch, ExceptionFilter, HttpException } from '@nestjs/common';
import type { Response } from 'express';

export interface ErrorResponseBody {
  status: number;
  kind: string;
  detail: string;
  details?: unknown;
}

function detailFrom(message: unknown, fallback: string): string {
  if (Array.isArray(message)) {
    return message.map((m) => String(m)).join('; ');
  }
  return typeof message === 'string' ? message : fallback;
}

/**
 * Renders every HttpException as `{ status, kind, detail, details? }`.
 *
 * Outcome failures already carry `kind`; framework errors (validation,
 * unknown routes) are reported as `HttpError`.
 */
@Catch(HttpException)
export class HierarchyExceptionFilter implements ExceptionFilter {
  catch(exception: HttpException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = exception.getStatus();
    const raw = exception.getResponse();

    const body: ErrorResponseBody = { status, kind: 'HttpError', detail: exception.message };

    if (typeof raw === 'string') {
      body.detail = raw;
    } else if (typeof raw === 'object' && raw !== null) {
      const fields = new Map<string, unknown>(Object.entries(raw));
      const kind = fields.get('kind');
      if (typeof kind === 'string') {
        body.kind = kind;
      }
      body.detail = detailFrom(fields.get('detail') ?? fields.get('message'), exception.message);
      if (fields.has('details')) {
        body.details = fields.get('details');
      }
    }

    response.status(status).json(body);
  }
}
