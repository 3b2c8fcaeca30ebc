/**
 * Analysis Request and Result Models
 *
 * Schemas for what-if upgrade simulations, village comparisons and the
 * aggregate views built on top of enriched villages.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

import type { EnrichedVillage, GapCategory, PriorityTier } from './village.js';

// Upgrade kind enumeration
export const UpgradeKind = {
  SCHOOL: 'school',
  TOILET: 'toilet',
  PHC: 'phc',
  WATER_POINT: 'waterPoint',
  ELECTRICITY_HOURS: 'electricityHours',
} as const;

export type UpgradeKind = (typeof UpgradeKind)[keyof typeof UpgradeKind];

/**
 * Display labels for upgrade kinds
 */
export const UPGRADE_LABELS: Record<UpgradeKind, string> = {
  school: 'School',
  toilet: 'Toilet (100 HH)',
  phc: 'PHC',
  waterPoint: 'Water Point',
  electricityHours: 'Electricity Hours',
};

export const MIN_UPGRADE_AMOUNT = 1;
export const MAX_UPGRADE_AMOUNT = 5;

/**
 * A single-field adjustment applied to a derived copy of a village
 */
export const UpgradeSchema = z.object({
  kind: z.nativeEnum(UpgradeKind),
  amount: z.number().int().min(MIN_UPGRADE_AMOUNT).max(MAX_UPGRADE_AMOUNT),
});

export type Upgrade = z.infer<typeof UpgradeSchema>;

/**
 * Simulation request schema
 */
export const SimulationRequestSchema = UpgradeSchema.extend({
  villageId: z.string().min(1),
});

export type SimulationRequest = z.infer<typeof SimulationRequestSchema>;

/**
 * Outcome of a what-if simulation
 */
export interface SimulationResult {
  upgrade: Upgrade;
  description: string;
  original: EnrichedVillage;
  simulated: EnrichedVillage;
  scoreChange: number;
  tierChanged: boolean;
}

/**
 * Comparison request schema
 */
export const ComparisonRequestSchema = z.object({
  firstVillageId: z.string().min(1),
  secondVillageId: z.string().min(1),
});

export type ComparisonRequest = z.infer<typeof ComparisonRequestSchema>;

/**
 * Tier counts across an analysed collection
 */
export interface AnalysisSummary {
  totalVillages: number;
  tierCounts: Record<PriorityTier, number>;
}

/**
 * Number of villages exhibiting each gap category
 */
export type GapDistribution = Partial<Record<GapCategory, number>>;

/**
 * Validates a simulation request
 */
export function validateSimulationRequest(data: unknown): SimulationRequest {
  return SimulationRequestSchema.parse(data);
}

/**
 * Validates a comparison request
 */
export function validateComparisonRequest(data: unknown): ComparisonRequest {
  return ComparisonRequestSchema.parse(data);
}
