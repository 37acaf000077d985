/**
 * Candidate Repository
 *
 * Data access for candidates and their name claims. A name claim maps one
 * normalized name to exactly one candidate; creating a candidate writes the
 * claim and the details in one transaction so concurrent drafts of the same
 * new name converge on a single record.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  buildCandidateItem,
  buildNameClaimItem,
  Candidate,
  mapCandidateItem,
  NewCandidate,
} from '../models/candidate';
import { ConflictError } from '../models/errors';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore, readString } from './entity-store';
import { candidateKey, candidateNameClaimKey, NAME_PREFIX, nameBucketPartition } from './keys';

/**
 * Entry of a name bucket: one claimed normalized name
 */
export interface CandidateNameClaim {
  candidate_id: string;
  name: string;
  normalized_name: string;
}

export class CandidateRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  async findById(candidateId: string): Promise<Candidate | null> {
    const item = await this.store.get(candidateKey(candidateId));
    return item ? mapCandidateItem(item) : null;
  }

  /**
   * Batch load candidates, keyed by candidate ID
   */
  async findByIds(candidateIds: string[]): Promise<Map<string, Candidate>> {
    const items = await this.store.batchGet(candidateIds.map(candidateKey));
    const candidates = new Map<string, Candidate>();
    for (const item of items) {
      const candidate = mapCandidateItem(item);
      if (candidate) {
        candidates.set(candidate.id, candidate);
      }
    }
    return candidates;
  }

  /**
   * List the name claims sharing the first character of `normalizedName`
   */
  async findByNameBucket(normalizedName: string): Promise<CandidateNameClaim[]> {
    const items = await this.store.queryByPrefix(nameBucketPartition(normalizedName), NAME_PREFIX);
    return items.flatMap((item) => {
      const candidateId = readString(item, 'CandidateID');
      if (!candidateId) {
        return [];
      }
      return [
        {
          candidate_id: candidateId,
          name: readString(item, 'Name') ?? '',
          normalized_name: readString(item, 'NormalizedName') ?? item.SK.slice(NAME_PREFIX.length),
        },
      ];
    });
  }

  /**
   * Create a candidate unless its normalized name is already claimed
   *
   * @returns The candidate ID and whether this call created it
   * @throws ConflictError if the claim write lost but no claim can be read back
   */
  async createCandidateIfAbsent(
    normalizedName: string,
    candidate: NewCandidate
  ): Promise<{ id: string; wasCreated: boolean }> {
    const id = uuidv4();

    const result = await this.store.transactWrite([
      {
        type: 'put',
        item: buildNameClaimItem(id, normalizedName, candidate.name),
        condition: { type: 'notExists' },
      },
      {
        type: 'put',
        item: buildCandidateItem(id, normalizedName, candidate),
        condition: { type: 'notExists' },
      },
    ]);

    if (result.committed) {
      return { id, wasCreated: true };
    }

    // Another request claimed the name first
    const claim = await this.store.get(candidateNameClaimKey(normalizedName));
    const existingId = claim ? readString(claim, 'CandidateID') : undefined;
    if (!existingId) {
      throw new ConflictError(`Candidate name "${normalizedName}" could not be claimed`);
    }
    return { id: existingId, wasCreated: false };
  }
}
