import {
  applyDecorators,
  Post,
  HttpCode,
  HttpStatus,
  UseInterceptors,
} from '@nestjs/common';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';

/**
 * Webhook endpoint decorator
 * Providers expect 200 for every delivery we accept, and we need the raw body
 */
export function WebhookEndpoint(path: string) {
  return applyDecorators(
    Post(path),
    HttpCode(HttpStatus.OK),
    UseInterceptors(RawBodyInterceptor),
  );
}
