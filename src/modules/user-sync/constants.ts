/**
 * Injection tokens for the user sync module
 */

export const USER_SYNC_CONFIG = Symbol('USER_SYNC_CONFIG');
export const RECORD_STORE = Symbol('RECORD_STORE');
export const USER_RECORD_ACCESSOR = Symbol('USER_RECORD_ACCESSOR');
export const PAYMENT_NORMALIZER = Symbol('PAYMENT_NORMALIZER');
export const IDENTITY_NORMALIZER = Symbol('IDENTITY_NORMALIZER');
export const PAYMENT_VERIFIER = Symbol('PAYMENT_VERIFIER');
export const IDENTITY_VERIFIER = Symbol('IDENTITY_VERIFIER');
