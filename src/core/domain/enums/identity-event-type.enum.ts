/**
 * Identity provider user lifecycle events
 */
export enum IdentityEventType {
  USER_CREATED = 'user.created',
  USER_UPDATED = 'user.updated',
  USER_DELETED = 'user.deleted',
}
