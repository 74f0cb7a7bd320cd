/**
 * Model re-exports
 *
 * @module models
 */

export * from './document.js';
export * from './versioning.js';
export * from './comparison.js';
export * from './legalization.js';
export * from './report.js';
export * from './pipeline.js';
