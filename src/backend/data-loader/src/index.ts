/**
 * Data Loader Package
 *
 * Loads the village source and exposes it through a read-only repository.
 */

export * from './csv-loader.js';
export * from './village-repository.js';
