import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.rawBody` holds the exact bytes for signature
 * verification, while leaving the parsed body in place for DTO validation
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context
      .switchToHttp()
      .getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      // Already captured by NestFactory.create(..., { rawBody: true })
      return next.handle();
    }

    const body: unknown = request.body;
    if (Buffer.isBuffer(body)) {
      request.rawBody = body;
    } else if (typeof body === 'string') {
      request.rawBody = Buffer.from(body);
    } else if (body && typeof body === 'object') {
      // Re-serialized JSON will not match a provider signature
      request.rawBody = Buffer.from(JSON.stringify(body));
    }

    return next.handle();
  }
}
