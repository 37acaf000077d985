/**
 * Pick Models
 *
 * A pick is a (player, year, candidate) selection. The matching pick claim
 * under the year partition guarantees at most one holder per candidate per
 * year; both are written in the same transaction.
 */

import { readNumber, readString, StoreItem } from '../repositories/entity-store';
import { idFromPartition, parsePickSortKey, pickClaimKey, pickKey } from '../repositories/keys';

/**
 * Pick entity
 */
export interface Pick {
  player_id: string;
  year: number;
  candidate_id: string;
  timestamp: string;             // ISO-8601
}

/**
 * Per-year exclusive claim on a candidate
 */
export interface PickClaim {
  year: number;
  candidate_id: string;
  player_id: string;
  timestamp: string;
}

/**
 * Convert a stored PLAYER#{id}/PICK#... item to a Pick
 */
export function mapPickItem(item: StoreItem): Pick | null {
  const playerId = idFromPartition(item.PK, 'PLAYER#');
  const parsed = parsePickSortKey(item.SK);
  if (!playerId || !parsed) {
    return null;
  }
  return {
    player_id: playerId,
    year: readNumber(item, 'Year') ?? parsed.year,
    candidate_id: parsed.candidateId,
    timestamp: readString(item, 'Timestamp') ?? '',
  };
}

export function mapPickClaimItem(year: number, candidateId: string, item: StoreItem): PickClaim | null {
  const playerId = readString(item, 'PlayerID');
  if (!playerId) {
    return null;
  }
  return {
    year,
    candidate_id: candidateId,
    player_id: playerId,
    timestamp: readString(item, 'Timestamp') ?? '',
  };
}

export function buildPickItem(pick: Pick): StoreItem {
  return {
    ...pickKey(pick.player_id, pick.year, pick.candidate_id),
    Year: pick.year,
    PersonID: pick.candidate_id,
    Timestamp: pick.timestamp,
  };
}

export function buildPickClaimItem(pick: Pick): StoreItem {
  return {
    ...pickClaimKey(pick.year, pick.candidate_id),
    Type: 'PickClaim',
    Year: pick.year,
    PersonID: pick.candidate_id,
    PlayerID: pick.player_id,
    Timestamp: pick.timestamp,
  };
}
