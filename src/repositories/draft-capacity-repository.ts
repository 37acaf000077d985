/**
 * Draft Capacity Repository
 *
 * Capacity records are versioned. A save names the version it read; the
 * stored version becomes `expectedVersion + 1` only when nobody else wrote
 * in between.
 */

import {
  buildDraftCapacityItem,
  DraftCapacityRecord,
  DraftCapacityValues,
  mapDraftCapacityItem,
} from '../models/draft-capacity';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore } from './entity-store';
import { draftCapacityKey } from './keys';

export class DraftCapacityRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  async find(playerId: string, year: number): Promise<DraftCapacityRecord | null> {
    const item = await this.store.get(draftCapacityKey(playerId, year));
    return item ? mapDraftCapacityItem(year, item) : null;
  }

  /**
   * Save capacity values guarded by the version last read
   *
   * @param expectedVersion - Version read earlier, 0 when no record existed
   * @returns false when the stored version has moved on
   */
  async save(values: DraftCapacityValues, expectedVersion: number): Promise<boolean> {
    return this.store.putConditional(buildDraftCapacityItem(values, expectedVersion + 1), {
      type: 'versionEquals',
      version: expectedVersion,
    });
  }
}
