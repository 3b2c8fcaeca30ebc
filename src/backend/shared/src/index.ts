/**
 * Shared Package
 *
 * Exports the data models, schemas, errors, logging and configuration
 * shared by every village gap analysis package.
 */

// Village models and schemas
export * from './models/village.js';

// Threshold sets
export * from './models/thresholds.js';

// Simulation, comparison and aggregate models
export * from './models/analysis.js';

// Errors
export * from './errors/errors.js';

// Logging
export * from './logging/logger.js';

// Configuration
export * from './config/app-config.js';
