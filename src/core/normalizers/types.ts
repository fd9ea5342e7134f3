import { OutcomeStatus, SkipReason } from '../domain/enums';
import { UserRecord } from '../domain/models';

/**
 * A mutation was written
 */
export interface AppliedOutcome {
  status: OutcomeStatus.APPLIED;
  eventType: string;
  userId: string;
  record: UserRecord | null;
}

/**
 * The event was recognised but could not or need not be acted on
 */
export interface SkippedOutcome {
  status: OutcomeStatus.SKIPPED;
  eventType: string;
  reason: SkipReason;
  detail: string;
  record?: UserRecord;
}

export interface IgnoredOutcome {
  status: OutcomeStatus.IGNORED;
  eventType: string;
}

/**
 * Result of handling one webhook event
 */
export type EventOutcome = AppliedOutcome | SkippedOutcome | IgnoredOutcome;

export function applied(
  eventType: string,
  userId: string,
  record: UserRecord | null,
): AppliedOutcome {
  return { status: OutcomeStatus.APPLIED, eventType, userId, record };
}

export function skipped(
  eventType: string,
  reason: SkipReason,
  detail: string,
  record?: UserRecord,
): SkippedOutcome {
  return record
    ? { status: OutcomeStatus.SKIPPED, eventType, reason, detail, record }
    : { status: OutcomeStatus.SKIPPED, eventType, reason, detail };
}

export function ignored(eventType: string): IgnoredOutcome {
  return { status: OutcomeStatus.IGNORED, eventType };
}
