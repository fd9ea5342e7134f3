/**
 * Result classification for a single handled webhook event
 */
export enum OutcomeStatus {
  /**
   * A mutation was written to the user store
   */
  APPLIED = 'applied',

  /**
   * The event was understood but nothing was written
   */
  SKIPPED = 'skipped',

  /**
   * The event type is not one we act on
   */
  IGNORED = 'ignored',
}
