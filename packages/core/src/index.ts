/**
 * @rootbox/core - chroot(1) invocation building, launching and configuration
 */

export * from './config/index.js';
export * from './unix/index.js';
export * from './utils/index.js';
