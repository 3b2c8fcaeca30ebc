/**
 * Reporting Package
 *
 * Read-only consumers of enriched villages: comparisons, map markers,
 * spreadsheet export and the paginated document report.
 */

export * from './comparison-engine.js';
export * from './map-markers.js';
export * from './spreadsheet-export.js';
export * from './document-report.js';
