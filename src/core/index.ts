/**
 * User sync core - event normalization and record access
 * Independent of the HTTP layer and of any particular store
 */

// Domain
export * from './domain/enums';
export * from './domain/errors';
export * from './domain/models';

// Interfaces and contracts
export * from './interfaces';

// Helpers
export * from './utils';

// Record access
export * from './repositories';

// Event normalization
export * from './normalizers';
