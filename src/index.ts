/**
 * User Sync
 *
 * Normalizes payment and identity provider webhooks into idempotent
 * updates on a users record store.
 */

import 'reflect-metadata';

// Core: records, normalizers, errors
export * from './core';

// Storage adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';

// Webhook verifiers
export * from './adapters/providers/stripe';
export * from './adapters/providers/identity';

// Environment schema
export * from './config';

// NestJS module, controllers and service
export * from './modules';

// DTOs and Swagger decorators
export * from './_shared';
