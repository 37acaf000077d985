/**
 * Single-table key layout
 *
 *   PLAYER#{id}            DETAILS                         player profile
 *   PLAYER#{id}            PICK#{year}#{candidateId}       pick
 *   PLAYER#{id}            DRAFT_SLOTS#{year}              draft capacity
 *   PERSON#{id}            DETAILS                         candidate
 *   NAME#{c}               NAME#{normalizedName}           candidate name claim
 *   YEAR#{year}            ORDER#{pp}#PLAYER#{playerId}    draft order entry
 *   YEAR#{year}            CLAIM#{candidateId}             per-year pick claim
 *   MIGRATION#{from}_TO_{to}  METADATA                     season transition
 */

import { StoreKey } from './entity-store';

export const DETAILS_SORT_KEY = 'DETAILS';
export const ORDER_PREFIX = 'ORDER#';
export const CLAIM_PREFIX = 'CLAIM#';
export const NAME_PREFIX = 'NAME#';

const PLAYER_PREFIX = 'PLAYER#';
const PERSON_PREFIX = 'PERSON#';
const YEAR_PREFIX = 'YEAR#';

export function playerPartition(playerId: string): string {
  return `${PLAYER_PREFIX}${playerId}`;
}

export function yearPartition(year: number): string {
  return `${YEAR_PREFIX}${year}`;
}

export function playerKey(playerId: string): StoreKey {
  return { PK: playerPartition(playerId), SK: DETAILS_SORT_KEY };
}

export function candidateKey(candidateId: string): StoreKey {
  return { PK: `${PERSON_PREFIX}${candidateId}`, SK: DETAILS_SORT_KEY };
}

/**
 * Name claims are bucketed by the first character of the normalized name so
 * the matcher only scans a bounded set of candidates.
 */
export function nameBucketPartition(normalizedName: string): string {
  return `${NAME_PREFIX}${normalizedName.charAt(0)}`;
}

export function candidateNameClaimKey(normalizedName: string): StoreKey {
  return { PK: nameBucketPartition(normalizedName), SK: `${NAME_PREFIX}${normalizedName}` };
}

export function pickSortPrefix(year: number): string {
  return `PICK#${year}#`;
}

export function pickKey(playerId: string, year: number, candidateId: string): StoreKey {
  return { PK: playerPartition(playerId), SK: `${pickSortPrefix(year)}${candidateId}` };
}

export function pickClaimKey(year: number, candidateId: string): StoreKey {
  return { PK: yearPartition(year), SK: `${CLAIM_PREFIX}${candidateId}` };
}

export function draftOrderKey(year: number, position: number, playerId: string): StoreKey {
  const paddedPosition = String(position).padStart(2, '0');
  return { PK: yearPartition(year), SK: `${ORDER_PREFIX}${paddedPosition}#${PLAYER_PREFIX}${playerId}` };
}

export function draftCapacityKey(playerId: string, year: number): StoreKey {
  return { PK: playerPartition(playerId), SK: `DRAFT_SLOTS#${year}` };
}

export function seasonTransitionKey(fromYear: number, toYear: number): StoreKey {
  return { PK: `MIGRATION#${fromYear}_TO_${toYear}`, SK: 'METADATA' };
}

/**
 * Strip a known prefix from a partition key
 */
export function idFromPartition(partition: string, prefix: 'PLAYER#' | 'PERSON#'): string | null {
  return partition.startsWith(prefix) ? partition.slice(prefix.length) : null;
}

/**
 * Parse `ORDER#{position}#PLAYER#{playerId}`
 */
export function parseDraftOrderSortKey(sortKey: string): { position: number; playerId: string } | null {
  const parts = sortKey.split('#');
  if (parts.length < 4 || parts[0] !== 'ORDER' || parts[2] !== 'PLAYER') {
    return null;
  }
  const position = parseInt(parts[1], 10);
  const playerId = parts.slice(3).join('#');
  if (!Number.isInteger(position) || position < 1 || !playerId) {
    return null;
  }
  return { position, playerId };
}

/**
 * Parse `PICK#{year}#{candidateId}`
 */
export function parsePickSortKey(sortKey: string): { year: number; candidateId: string } | null {
  const parts = sortKey.split('#');
  if (parts.length < 3 || parts[0] !== 'PICK') {
    return null;
  }
  const year = parseInt(parts[1], 10);
  const candidateId = parts.slice(2).join('#');
  if (!Number.isInteger(year) || !candidateId) {
    return null;
  }
  return { year, candidateId };
}
