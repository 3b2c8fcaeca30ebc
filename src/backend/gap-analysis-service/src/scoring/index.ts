/**
 * Priority Scoring
 *
 * Exports the priority classifier and ranking helpers.
 */

export * from './priority-classifier.js';
export * from './village-ranker.js';
