/**
 * Village Repository
 *
 * Read-only access to the loaded village collection. The collection is
 * frozen at construction; simulations work on derived copies and never
 * write back.
 */

import { VillageNotFoundError, type VillageRecord } from '@village-gap/shared';

export interface VillageRepository {
  /** All villages in source order */
  list(): readonly Readonly<VillageRecord>[];

  findById(villageId: string): Readonly<VillageRecord> | undefined;

  /**
   * @throws VillageNotFoundError when no village has the identifier
   */
  getById(villageId: string): Readonly<VillageRecord>;
}

/**
 * In-memory repository backed by a frozen array
 */
export class InMemoryVillageRepository implements VillageRepository {
  private readonly villages: readonly Readonly<VillageRecord>[];
  private readonly byId: ReadonlyMap<string, Readonly<VillageRecord>>;

  constructor(villages: readonly VillageRecord[]) {
    this.villages = Object.freeze(villages.map((village) => Object.freeze({ ...village })));
    this.byId = new Map(this.villages.map((village) => [village.villageId, village]));
  }

  list(): readonly Readonly<VillageRecord>[] {
    return this.villages;
  }

  findById(villageId: string): Readonly<VillageRecord> | undefined {
    return this.byId.get(villageId);
  }

  getById(villageId: string): Readonly<VillageRecord> {
    const village = this.findById(villageId);
    if (!village) {
      throw new VillageNotFoundError(villageId);
    }
    return village;
  }
}
