/**
 * Upgrade Simulator
 *
 * Builds a derived copy of a village with exactly one field adjusted. The
 * source record is never modified.
 *
 * @tested tests/property/simulation.property.test.ts
 */

import {
  UPGRADE_LABELS,
  type Upgrade,
  type UpgradeKind,
  type VillageCountField,
  type VillageRecord,
} from '@village-gap/shared';

/**
 * Toilets are built in blocks of this many households
 */
export const TOILET_BLOCK_SIZE = 100;

export const MAX_ELECTRICITY_HOURS = 24;

/**
 * Village field each upgrade kind adjusts
 */
export const UPGRADE_FIELDS: Record<UpgradeKind, VillageCountField> = {
  school: 'schools',
  toilet: 'toilets',
  phc: 'phcs',
  waterPoint: 'waterPoints',
  electricityHours: 'electricityHours',
};

/**
 * Calculates the adjusted value of the upgraded field
 */
export function upgradedValue(village: Readonly<VillageRecord>, upgrade: Upgrade): number {
  switch (upgrade.kind) {
    case 'toilet':
      return village.toilets + upgrade.amount * TOILET_BLOCK_SIZE;
    case 'electricityHours':
      return Math.min(MAX_ELECTRICITY_HOURS, village.electricityHours + upgrade.amount);
    default:
      return village[UPGRADE_FIELDS[upgrade.kind]] + upgrade.amount;
  }
}

/**
 * Returns a new village record with the upgrade applied
 */
export function applyUpgrade(village: Readonly<VillageRecord>, upgrade: Upgrade): VillageRecord {
  const upgraded: VillageRecord = { ...village };
  upgraded[UPGRADE_FIELDS[upgrade.kind]] = upgradedValue(village, upgrade);
  return upgraded;
}

/**
 * Describes an upgrade, e.g. "+2 Toilet (100 HH)"
 */
export function describeUpgrade(upgrade: Upgrade): string {
  return `+${upgrade.amount} ${UPGRADE_LABELS[upgrade.kind]}`;
}
