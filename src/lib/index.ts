/**
 * Shared library utilities.
 *
 * Re-exports all utility modules for convenient imports.
 */

export * from './errors.js';
export * from './logger.js';
export * from './env.js';
