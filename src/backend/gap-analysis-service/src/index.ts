/**
 * Gap Analysis Service
 *
 * Entry point for the gap/score engine: rules, priority scoring, what-if
 * simulation and collection-level analysis.
 */

export const VERSION = '1.0.0';

// Per-category gap rules and the evaluator
export * from './rules/index.js';

// Priority classification and ranking
export * from './scoring/index.js';

// What-if upgrades
export * from './simulation/index.js';

// Collection-level orchestration
export * from './analysis/index.js';
