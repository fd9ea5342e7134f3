/**
 * Why a recognised event produced no write
 */
export enum SkipReason {
  USER_NOT_FOUND = 'user_not_found',
  MISSING_FIELD = 'missing_field',
  ALREADY_LINKED = 'already_linked',
  ALREADY_EXISTS = 'already_exists',
}
