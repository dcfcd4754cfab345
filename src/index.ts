/**
 * convoy
 *
 * Durable session state and token-budgeted context management for
 * interactive coding assistants.
 */

export * from './types.js';
export * from './errors/index.js';
export * from './integrations/index.js';
export * from './config/index.js';
export * from './defaults.js';
export * from './paths.js';
