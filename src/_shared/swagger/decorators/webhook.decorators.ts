import { applyDecorators } from '@nestjs/common';
import {
  ApiOperation,
  ApiResponse,
  ApiBody,
  ApiHeader,
  ApiOkResponse,
} from '@nestjs/swagger';
import {
  IdentityWebhookDto,
  IdentityWebhookResponseDto,
  PaymentWebhookResponseDto,
} from '../../dto';

const errorSchema = (example: string) => ({
  type: 'object',
  properties: {
    statusCode: { type: 'number' },
    message: { type: 'string', example },
  },
});

/**
 * Swagger decorator for the payment webhook endpoint
 */
export const ApiPaymentWebhook = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment webhook',
      description:
        'Verifies the Stripe signature against the raw body, then links customers and updates subscription state on the matching user. Unmatched events still answer 200 with a skipped outcome.',
    }),
    ApiHeader({
      name: 'stripe-signature',
      description: 'Signature for Stripe webhooks',
      required: true,
      example: 't=1614556800,v1=5257a869e7ecf1234...',
    }),
    ApiBody({
      description: 'Raw Stripe event',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          id: 'evt_123',
          type: 'customer.subscription.created',
          data: {
            object: {
              customer: 'cus_42',
              plan: { id: 'plan_pro' },
              status: 'active',
            },
          },
        },
      },
    }),
    ApiOkResponse({
      description: 'Event handled',
      type: PaymentWebhookResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Missing or invalid signature, or unparseable payload',
      schema: errorSchema('Invalid signature'),
    }),
    ApiResponse({
      status: 500,
      description: 'Event could not be applied',
      schema: errorSchema('Failed to update users: connection refused'),
    }),
  );
};

/**
 * Swagger decorator for the identity webhook endpoint
 */
export const ApiIdentityWebhook = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive identity webhook',
      description:
        'Creates, updates or deletes the user record. When a signing secret is configured the svix headers are verified first.',
    }),
    ApiHeader({ name: 'svix-id', required: false }),
    ApiHeader({ name: 'svix-timestamp', required: false }),
    ApiHeader({ name: 'svix-signature', required: false }),
    ApiBody({ type: IdentityWebhookDto }),
    ApiOkResponse({
      description: 'Event handled; extracted user details echoed back',
      type: IdentityWebhookResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Missing user data or invalid signature',
      schema: errorSchema('Invalid webhook payload: missing user data'),
    }),
    ApiResponse({
      status: 500,
      description: 'Event could not be applied',
      schema: errorSchema('User ID is required for update'),
    }),
  );
};
