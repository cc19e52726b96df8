/**
 * leaptour - leaper tours by Warnsdorff's rule
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Tour construction
export * from './core/tour/index.js';

// Retrying search
export * from './core/search/index.js';

// Configuration
export * from './infra/config/index.js';

// Utilities
export * from './shared/utils/index.js';
export * from './shared/ui/index.js';
export * from './shared/context.js';
export * from './shared/exitCodes.js';
