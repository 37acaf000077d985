/**
 * Draft Order Repository
 */

import { buildDraftOrderItem, DraftOrderEntry, mapDraftOrderItem } from '../models/draft-order';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore } from './entity-store';
import { draftOrderKey, ORDER_PREFIX, yearPartition } from './keys';

export class DraftOrderRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  /**
   * Draft order for a year, sorted by position ascending
   */
  async findByYear(year: number): Promise<DraftOrderEntry[]> {
    const items = await this.store.queryByPrefix(yearPartition(year), ORDER_PREFIX);
    return items
      .flatMap((item) => {
        const entry = mapDraftOrderItem(year, item);
        return entry ? [entry] : [];
      })
      .sort((a, b) => a.position - b.position || a.player_id.localeCompare(b.player_id));
  }

  /**
   * Overwrite the draft order for a year
   *
   * Every new entry is written first, then entries of the year that are not
   * part of the new order are removed. Running it twice with the same entries
   * leaves the same set.
   */
  async replaceYear(year: number, entries: DraftOrderEntry[]): Promise<void> {
    const existing = await this.findByYear(year);

    for (const entry of entries) {
      await this.store.put(buildDraftOrderItem({ ...entry, year }));
    }

    const keep = new Set(entries.map((entry) => draftOrderKey(year, entry.position, entry.player_id).SK));
    for (const entry of existing) {
      const key = draftOrderKey(year, entry.position, entry.player_id);
      if (!keep.has(key.SK)) {
        await this.store.delete(key);
      }
    }
  }
}
