import { Logger } from '@nestjs/common';
import { IdentityEventType, SkipReason } from '../domain/enums';
import { NotFoundError, ValidationError } from '../domain/errors';
import { UserDetails } from '../domain/models';
import { UserRecordAccessor } from '../repositories';
import { extractUserDetails } from './identity-details.extractor';
import { EventOutcome, applied, ignored, skipped } from './types';

/**
 * Identity Event Normalizer
 *
 * Extracts canonical user details from identity provider payloads and turns
 * user lifecycle events into create, update and delete operations.
 * Create and delete are idempotent; update requires the record to exist.
 */
export class IdentityEventNormalizer {
  private readonly logger = new Logger(IdentityEventNormalizer.name);

  constructor(private readonly users: UserRecordAccessor) {}

  extract(userData: unknown): UserDetails {
    const details = extractUserDetails(userData);
    this.logger.debug(`Extracted user details: ${JSON.stringify(details, null, 2)}`);
    return details;
  }

  async handle(eventType: string, details: UserDetails): Promise<EventOutcome> {
    try {
      switch (eventType) {
        case IdentityEventType.USER_CREATED:
          return await this.handleUserCreated(eventType, details);
        case IdentityEventType.USER_UPDATED:
          return await this.handleUserUpdated(eventType, details);
        case IdentityEventType.USER_DELETED:
          return await this.handleUserDeleted(eventType, details);
        default:
          this.logger.debug(`Unhandled user event type: ${eventType}`);
          return ignored(eventType);
      }
    } catch (error) {
      this.logger.error(
        `Error handling user event ${eventType}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  private async handleUserCreated(
    eventType: string,
    details: UserDetails,
  ): Promise<EventOutcome> {
    const userId = requireUserId(details, 'creation');

    const existing = await this.users.getById(userId);
    if (existing) {
      this.logger.log(`User already exists with ID: ${userId}`);
      return skipped(
        eventType,
        SkipReason.ALREADY_EXISTS,
        `User already exists with ID: ${userId}`,
        existing,
      );
    }

    this.logger.log(`Creating new user with ID: ${userId}`);
    const created = await this.users.insert({ ...details, id: userId });
    this.logger.log(`User created successfully: ${userId}`);

    return applied(eventType, userId, created);
  }

  private async handleUserUpdated(
    eventType: string,
    details: UserDetails,
  ): Promise<EventOutcome> {
    const userId = requireUserId(details, 'update');

    const existing = await this.users.getById(userId);
    if (!existing) {
      throw new NotFoundError(this.users.collection, userId);
    }

    this.logger.log(`Updating user: ${userId}`);
    const updated = await this.users.update(userId, details);
    this.logger.log(`User updated successfully: ${userId}`);

    return applied(eventType, userId, updated);
  }

  private async handleUserDeleted(
    eventType: string,
    details: UserDetails,
  ): Promise<EventOutcome> {
    const userId = requireUserId(details, 'deletion');

    const existing = await this.users.getById(userId);
    if (!existing) {
      this.logger.warn(`User not found for deletion with ID: ${userId}`);
      return skipped(
        eventType,
        SkipReason.USER_NOT_FOUND,
        `User not found for deletion with ID: ${userId}`,
      );
    }

    this.logger.log(`Deleting user: ${userId}`);
    const deleted = await this.users.delete(userId);
    if (!deleted) {
      this.logger.warn(`User vanished before deletion with ID: ${userId}`);
      return skipped(
        eventType,
        SkipReason.USER_NOT_FOUND,
        `User not found for deletion with ID: ${userId}`,
      );
    }
    this.logger.log(`User deleted successfully: ${userId}`);

    return applied(eventType, userId, existing);
  }
}

function requireUserId(details: UserDetails, action: string): string {
  if (!details.id) {
    throw new ValidationError(`User ID is required for ${action}`, 'id');
  }
  return details.id;
}
