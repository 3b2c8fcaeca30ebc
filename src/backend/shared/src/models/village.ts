/**
 * Village Data Models and Zod Schemas
 *
 * Defines the canonical schemas for raw village records and the enriched
 * records produced by gap analysis.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

// Gap category enumeration (values are the display labels, in evaluation order)
export const GapCategory = {
  SCHOOLS: 'Schools',
  TOILETS: 'Toilets',
  PHCS: 'PHCs',
  WATER_POINTS: 'Water Points',
  ELECTRICITY: 'Electricity',
} as const;

export type GapCategory = (typeof GapCategory)[keyof typeof GapCategory];

export const GAP_CATEGORIES: readonly GapCategory[] = Object.values(GapCategory);

// Priority tier enumeration (values double as map marker colors)
export const PriorityTier = {
  RED: 'red',
  ORANGE: 'orange',
  GREEN: 'green',
} as const;

export type PriorityTier = (typeof PriorityTier)[keyof typeof PriorityTier];

export const PriorityLevel = {
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;

export type PriorityLevel = (typeof PriorityLevel)[keyof typeof PriorityLevel];

const countField = z.number().int().min(0);

/**
 * Village record schema
 *
 * Counts are non-negative integers. Coordinates are omitted when the source
 * value could not be parsed.
 */
export const VillageRecordSchema = z.object({
  villageId: z.string().min(1),
  villageName: z.string(),
  population: countField,
  households: countField,
  schools: countField,
  toilets: countField,
  phcs: countField,
  waterPoints: countField,
  electricityHours: z.number().min(0),
  latitude: z.number().finite().optional(),
  longitude: z.number().finite().optional(),
});

export type VillageRecord = z.infer<typeof VillageRecordSchema>;

/**
 * Numeric fields a comparison or simulation may touch
 */
export type VillageCountField = Exclude<
  {
    [K in keyof VillageRecord]-?: VillageRecord[K] extends number | undefined ? K : never;
  }[keyof VillageRecord],
  'latitude' | 'longitude'
>;

/**
 * A single category shortfall for one village
 */
export const GapFindingSchema = z.object({
  category: z.nativeEnum(GapCategory),
  required: z.number().min(0),
  actual: z.number().min(0),
  shortfall: z.number().positive(),
  suggestion: z.string().min(1),
  contribution: z.number().int().min(0),
});

export type GapFinding = z.infer<typeof GapFindingSchema>;

/**
 * Result of evaluating every rule against one village
 */
export interface GapEvaluation {
  gaps: GapCategory[];
  score: number;
  improvements: string[];
  findings: GapFinding[];
}

/**
 * Enriched village schema: the record plus its computed gap analysis
 */
export const EnrichedVillageSchema = VillageRecordSchema.extend({
  gaps: z.array(z.nativeEnum(GapCategory)),
  priorityScore: z.number().int().min(0),
  priorityTier: z.nativeEnum(PriorityTier),
  improvements: z.array(z.string()),
  gapsSummary: z.string(),
  improvementsSummary: z.string(),
});

export type EnrichedVillage = z.infer<typeof EnrichedVillageSchema>;

/**
 * Validates a village record
 */
export function validateVillageRecord(data: unknown): VillageRecord {
  return VillageRecordSchema.parse(data);
}

/**
 * Safely validates a village record
 */
export function safeValidateVillageRecord(
  data: unknown
): z.SafeParseReturnType<unknown, VillageRecord> {
  return VillageRecordSchema.safeParse(data);
}
