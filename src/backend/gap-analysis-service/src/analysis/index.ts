/**
 * Village Analysis
 */

export * from './village-analysis-service.js';
