/**
 * Draft Capacity Models
 *
 * Derived per-player, per-year slot accounting. Always reconcilable from the
 * player's picks; `version` serializes concurrent commits for one player.
 */

import { readNumber, readString, StoreItem } from '../repositories/entity-store';
import { draftCapacityKey, idFromPartition } from '../repositories/keys';

/**
 * Maximum active picks a player may hold in a year
 */
export const MAX_PICKS = 20;

/**
 * Draft capacity record
 */
export interface DraftCapacityRecord {
  player_id: string;
  year: number;
  max_picks: number;
  active_pick_count: number;
  available_slots: number;
  version: number;
  last_updated: string;
}

/**
 * Capacity values before a version is assigned
 */
export type DraftCapacityValues = Omit<DraftCapacityRecord, 'version'>;

export function createCapacityValues(
  playerId: string,
  year: number,
  activePickCount: number,
  lastUpdated: string
): DraftCapacityValues {
  return {
    player_id: playerId,
    year,
    max_picks: MAX_PICKS,
    active_pick_count: activePickCount,
    available_slots: Math.max(MAX_PICKS - activePickCount, 0),
    last_updated: lastUpdated,
  };
}

/**
 * Convert a stored PLAYER#{id}/DRAFT_SLOTS#{year} item
 */
export function mapDraftCapacityItem(year: number, item: StoreItem): DraftCapacityRecord | null {
  const playerId = idFromPartition(item.PK, 'PLAYER#');
  if (!playerId) {
    return null;
  }
  const maxPicks = readNumber(item, 'MaxPicks') ?? MAX_PICKS;
  const activePickCount = readNumber(item, 'CurrentPicks') ?? 0;
  return {
    player_id: playerId,
    year,
    max_picks: maxPicks,
    active_pick_count: activePickCount,
    available_slots: readNumber(item, 'AvailableSlots') ?? maxPicks - activePickCount,
    version: readNumber(item, 'Version') ?? 0,
    last_updated: readString(item, 'LastUpdated') ?? '',
  };
}

export function buildDraftCapacityItem(values: DraftCapacityValues, version: number): StoreItem {
  return {
    ...draftCapacityKey(values.player_id, values.year),
    Type: 'DraftSlots',
    Year: values.year,
    MaxPicks: values.max_picks,
    CurrentPicks: values.active_pick_count,
    AvailableSlots: values.available_slots,
    Version: version,
    LastUpdated: values.last_updated,
  };
}
