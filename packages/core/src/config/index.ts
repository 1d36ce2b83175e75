/**
 * rootbox Configuration Module
 */

export * from './config-manager.js';
export * from './types.js';
