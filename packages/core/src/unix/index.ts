/**
 * chroot(1) Integration
 *
 * Invocation building and launching for running programs under an alternate root.
 */

export * from './chroot.js';
export * from './command-executor.js';
export * from './shell-quote.js';
