/**
 * What-if Simulation
 */

export * from './upgrade-simulator.js';
