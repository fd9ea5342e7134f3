import {
  IsString,
  IsOptional,
  IsObject,
  IsNotEmptyObject,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { OutcomeStatus, SkipReason } from '../../core';

/**
 * Identity provider delivery: `{ type, data }`
 */
export class IdentityWebhookDto {
  @ApiPropertyOptional({
    description: 'Identity event type',
    example: 'user.created',
  })
  @IsOptional()
  @IsString()
  type?: string;

  @ApiProperty({
    description: 'User object as sent by the identity provider',
    example: {
      id: 'user_2abc',
      username: 'ada',
      first_name: 'Ada',
      last_name: 'Lovelace',
      primary_email_address_id: 'idn_2',
      email_addresses: [
        { id: 'idn_1', email_address: 'old@example.com' },
        { id: 'idn_2', email_address: 'ada@example.com' },
      ],
      phone_numbers: [],
    },
  })
  @IsObject()
  @IsNotEmptyObject()
  data!: Record<string, unknown>;
}

/**
 * Result of normalizing one event
 */
export class EventOutcomeDto {
  @ApiProperty({ enum: OutcomeStatus, example: OutcomeStatus.APPLIED })
  status!: OutcomeStatus;

  @ApiProperty({ example: 'customer.subscription.created' })
  eventType!: string;

  @ApiPropertyOptional({ description: 'Affected user', example: 'user_2abc' })
  userId?: string;

  @ApiPropertyOptional({ enum: SkipReason, example: SkipReason.USER_NOT_FOUND })
  reason?: SkipReason;

  @ApiPropertyOptional({ example: 'No user found with stripe customer ID: cus_42' })
  detail?: string;
}

/**
 * Response DTO for payment webhooks
 */
export class PaymentWebhookResponseDto {
  @ApiProperty({ example: 'success' })
  status!: 'success';

  @ApiProperty({ example: 'customer.subscription.created' })
  event_type!: string;

  @ApiProperty({ type: EventOutcomeDto })
  outcome!: EventOutcomeDto;
}

/**
 * Response DTO for identity webhooks, echoing the extracted user details
 */
export class IdentityWebhookResponseDto {
  @ApiProperty({ example: 'success' })
  status!: 'success';

  @ApiProperty({ example: 'user.created' })
  event_type!: string;

  @ApiPropertyOptional({ example: 'user_2abc' })
  id?: string;

  @ApiPropertyOptional({ example: 'ada@example.com' })
  email?: string;

  @ApiPropertyOptional({ example: '+15550100' })
  phone?: string;

  @ApiPropertyOptional({ example: 'ada' })
  username?: string;

  @ApiPropertyOptional({ example: 'Ada' })
  first_name?: string;

  @ApiPropertyOptional({ example: 'Lovelace' })
  last_name?: string;

  @ApiProperty({ example: 'Ada Lovelace' })
  full_name!: string;
}
