/**
 * DTOs for the webhook API
 */

export * from './webhook.dto';
