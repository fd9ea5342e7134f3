/**
 * User sync NestJS module
 */

export * from './user-sync';
