/**
 * Pick Repository
 *
 * Picks live under the player's partition; the per-year claim that makes a
 * candidate exclusive to one player lives under the year partition. Both are
 * only ever written together through `claimPick`.
 */

import { buildDraftCapacityItem, DraftCapacityValues } from '../models/draft-capacity';
import {
  buildPickClaimItem,
  buildPickItem,
  mapPickClaimItem,
  mapPickItem,
  Pick,
  PickClaim,
} from '../models/pick';
import { TransientStoreError } from '../models/errors';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore, TransactionWrite } from './entity-store';
import { CLAIM_PREFIX, pickClaimKey, pickSortPrefix, playerPartition, yearPartition } from './keys';

/**
 * Capacity record written in the same transaction as a pick
 */
export interface CapacityUpdate {
  values: DraftCapacityValues;
  expectedVersion: number;
}

/**
 * - CLAIMED: claim, pick and capacity (if given) were written
 * - ALREADY_CLAIMED: another pick holds the candidate for the year
 * - PICK_EXISTS: the player already has this pick row
 * - CAPACITY_CONFLICT: the capacity record version moved on
 */
export type ClaimPickOutcome = 'CLAIMED' | 'ALREADY_CLAIMED' | 'PICK_EXISTS' | 'CAPACITY_CONFLICT';

const CLAIM_INDEX = 0;
const PICK_INDEX = 1;
const CAPACITY_INDEX = 2;

export class PickRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  /**
   * All picks a player holds for a year
   */
  async findByPlayerAndYear(playerId: string, year: number): Promise<Pick[]> {
    const items = await this.store.queryByPrefix(playerPartition(playerId), pickSortPrefix(year));
    return items.flatMap((item) => {
      const pick = mapPickItem(item);
      return pick ? [pick] : [];
    });
  }

  async findClaim(year: number, candidateId: string): Promise<PickClaim | null> {
    const item = await this.store.get(pickClaimKey(year, candidateId));
    return item ? mapPickClaimItem(year, candidateId, item) : null;
  }

  /**
   * Every claim for a year, keyed by candidate ID
   */
  async findClaimsByYear(year: number): Promise<Map<string, PickClaim>> {
    const items = await this.store.queryByPrefix(yearPartition(year), CLAIM_PREFIX);
    const claims = new Map<string, PickClaim>();
    for (const item of items) {
      const candidateId = item.SK.slice(CLAIM_PREFIX.length);
      const claim = mapPickClaimItem(year, candidateId, item);
      if (claim) {
        claims.set(candidateId, claim);
      }
    }
    return claims;
  }

  /**
   * Atomically claim the candidate for the year and record the pick,
   * optionally together with the player's capacity record.
   * Nothing is written unless every condition holds.
   */
  async claimPick(pick: Pick, capacity?: CapacityUpdate): Promise<ClaimPickOutcome> {
    const writes: TransactionWrite[] = [
      { type: 'put', item: buildPickClaimItem(pick), condition: { type: 'notExists' } },
      { type: 'put', item: buildPickItem(pick), condition: { type: 'notExists' } },
    ];
    if (capacity) {
      writes.push({
        type: 'put',
        item: buildDraftCapacityItem(capacity.values, capacity.expectedVersion + 1),
        condition: { type: 'versionEquals', version: capacity.expectedVersion },
      });
    }

    const result = await this.store.transactWrite(writes);
    if (result.committed) {
      return 'CLAIMED';
    }

    const failed = new Set(result.failedIndexes);
    if (failed.has(CLAIM_INDEX)) {
      return 'ALREADY_CLAIMED';
    }
    if (failed.has(CAPACITY_INDEX)) {
      return 'CAPACITY_CONFLICT';
    }
    if (failed.has(PICK_INDEX)) {
      return 'PICK_EXISTS';
    }
    throw new TransientStoreError(`Pick transaction for ${pick.candidate_id} was cancelled`);
  }
}
