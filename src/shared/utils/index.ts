/**
 * Shared utilities module - exports utility functions
 */

export * from './debug.js';
export * from './error.js';
