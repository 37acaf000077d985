/**
 * Draft Order Models
 *
 * For a given year, positions form the contiguous permutation 1..N over the
 * participating players, one entry per player.
 */

import { StoreItem } from '../repositories/entity-store';
import { draftOrderKey, parseDraftOrderSortKey } from '../repositories/keys';

/**
 * Draft order entry
 */
export interface DraftOrderEntry {
  year: number;
  position: number;
  player_id: string;
}

/**
 * Convert a stored YEAR#{year}/ORDER#... item to a DraftOrderEntry
 */
export function mapDraftOrderItem(year: number, item: StoreItem): DraftOrderEntry | null {
  const parsed = parseDraftOrderSortKey(item.SK);
  if (!parsed) {
    return null;
  }
  return { year, position: parsed.position, player_id: parsed.playerId };
}

export function buildDraftOrderItem(entry: DraftOrderEntry): StoreItem {
  return {
    ...draftOrderKey(entry.year, entry.position, entry.player_id),
    Type: 'DraftOrder',
    Year: entry.year,
    DraftOrder: entry.position,
    PlayerID: entry.player_id,
  };
}
