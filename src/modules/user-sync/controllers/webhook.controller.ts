import {
  Controller,
  Body,
  Headers,
  Req,
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  Logger,
  RawBodyRequest,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import { WebhookHeaders, WebhookVerificationError } from '../../../core';
import {
  ApiIdentityWebhook,
  ApiPaymentWebhook,
  IdentityWebhookDto,
  IdentityWebhookResponseDto,
  PaymentWebhookResponseDto,
} from '../../../_shared';
import { WebhookEndpoint } from '../decorators/webhook.decorators';
import { UserSyncService } from '../services/user-sync.service';

/**
 * Webhook Controller
 *
 * HTTP entry points for the payment and identity providers.
 * Verification failures answer 400; anything thrown while applying an event answers 500.
 */
@ApiTags('Webhooks')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(private readonly userSyncService: UserSyncService) {}

  @WebhookEndpoint('payment')
  @ApiPaymentWebhook()
  async handlePaymentWebhook(
    @Req() request: RawBodyRequest<Request>,
    @Headers() headers: WebhookHeaders,
  ): Promise<PaymentWebhookResponseDto> {
    try {
      const { eventType, outcome } =
        await this.userSyncService.processPaymentWebhook(
          request.rawBody ?? Buffer.alloc(0),
          headers,
        );

      return { status: 'success', event_type: eventType, outcome };
    } catch (error) {
      throw this.toHttpException('payment', error);
    }
  }

  @WebhookEndpoint('identity')
  @ApiIdentityWebhook()
  async handleIdentityWebhook(
    @Req() request: RawBodyRequest<Request>,
    @Body(new ValidationPipe()) body: IdentityWebhookDto,
    @Headers() headers: WebhookHeaders,
  ): Promise<IdentityWebhookResponseDto> {
    try {
      const { eventType, details } =
        await this.userSyncService.processIdentityWebhook(
          body,
          request.rawBody,
          headers,
        );

      return { status: 'success', event_type: eventType, ...details };
    } catch (error) {
      throw this.toHttpException('identity', error);
    }
  }

  private toHttpException(source: string, error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    if (error instanceof WebhookVerificationError) {
      this.logger.warn(`Rejected ${source} webhook: ${error.message}`);
      return new BadRequestException(error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Error processing ${source} webhook: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return new InternalServerErrorException(message);
  }
}
