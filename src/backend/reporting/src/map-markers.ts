/**
 * Map Markers
 *
 * Turns enriched villages into marker data for a map view. Villages without
 * both coordinates are left off the map but stay in tabular outputs.
 *
 * @tested tests/integration/reporting.integration.test.ts
 */

import type { EnrichedVillage, PriorityTier } from '@village-gap/shared';

/**
 * Center used when no village has coordinates
 */
export const DEFAULT_MAP_CENTER: readonly [number, number] = [25.0, 80.0];

export interface MapMarker {
  villageId: string;
  latitude: number;
  longitude: number;
  color: PriorityTier;
  popupLines: string[];
}

/**
 * Popup text for a village marker
 */
export function buildPopupLines(village: EnrichedVillage): string[] {
  return [
    `${village.villageName} (Score: ${village.priorityScore})`,
    `Population: ${village.population}`,
    `Gaps: ${village.gapsSummary}`,
    `Needs: ${village.improvementsSummary}`,
  ];
}

export function buildMapMarkers(villages: readonly EnrichedVillage[]): MapMarker[] {
  const markers: MapMarker[] = [];
  for (const village of villages) {
    if (village.latitude === undefined || village.longitude === undefined) {
      continue;
    }
    markers.push({
      villageId: village.villageId,
      latitude: village.latitude,
      longitude: village.longitude,
      color: village.priorityTier,
      popupLines: buildPopupLines(village),
    });
  }
  return markers;
}

/**
 * Mean position of the markers, or the default center when there are none
 */
export function mapCenter(markers: readonly MapMarker[]): [number, number] {
  if (markers.length === 0) {
    return [DEFAULT_MAP_CENTER[0], DEFAULT_MAP_CENTER[1]];
  }
  const latitude = markers.reduce((sum, marker) => sum + marker.latitude, 0) / markers.length;
  const longitude = markers.reduce((sum, marker) => sum + marker.longitude, 0) / markers.length;
  return [latitude, longitude];
}
