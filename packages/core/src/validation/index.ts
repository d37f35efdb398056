/**
 * Structural validation for trees
 */

export * from './tree-validation.js';
