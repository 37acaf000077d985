/**
 * Draft Service
 *
 * Decides who drafts next and commits picks. A commit resolves the typed name
 * to a candidate (reusing a close match or creating one), then writes the
 * year claim, the pick and the player's capacity record in one transaction.
 * Concurrent commits for the same candidate and year leave exactly one pick;
 * concurrent commits by the same player are serialized by the capacity
 * record version.
 */

import { Candidate, isDeceased } from '../models/candidate';
import { CommitDraftResult, NextDrafterResult, PickCountEntry } from '../models/draft';
import { createCapacityValues, MAX_PICKS } from '../models/draft-capacity';
import {
  AlreadyDraftedError,
  CapacityExceededError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../models/errors';
import { CandidateRepository } from '../repositories/candidate-repository';
import { DraftCapacityRepository } from '../repositories/draft-capacity-repository';
import { DraftOrderRepository } from '../repositories/draft-order-repository';
import { PickRepository } from '../repositories/pick-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { selectNextDrafter } from '../utils/draft-selection';
import { DraftCommitOutcome, logDraftCommit } from '../utils/logger';
import { emitDraftCommitLatency } from '../utils/metrics';
import {
  DEFAULT_NAME_MATCHING_CONFIG,
  findBestMatch,
  NameMatchingConfig,
  normalizeName,
} from '../utils/name-matching';
import { countActivePicks, loadSeasonRoster } from '../utils/season-roster';

/**
 * Attempts at the pick transaction when the capacity record keeps moving
 */
export const MAX_COMMIT_ATTEMPTS = 3;

interface ResolvedCandidate {
  candidate: Candidate;
  wasNewCandidate: boolean;
}

function outcomeOf(error: unknown): DraftCommitOutcome {
  if (error instanceof AlreadyDraftedError) {
    return 'ALREADY_DRAFTED';
  }
  if (error instanceof CapacityExceededError) {
    return 'CAPACITY_EXCEEDED';
  }
  if (error instanceof ConflictError) {
    return 'CONFLICT';
  }
  if (error instanceof ValidationError || error instanceof NotFoundError) {
    return 'REJECTED';
  }
  return 'FAILED';
}

export class DraftService {
  constructor(
    private playerRepository: PlayerRepository,
    private candidateRepository: CandidateRepository,
    private draftOrderRepository: DraftOrderRepository,
    private pickRepository: PickRepository,
    private draftCapacityRepository: DraftCapacityRepository,
    private matchingConfig: NameMatchingConfig = DEFAULT_NAME_MATCHING_CONFIG,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Pick counts for every participant, in draft order
   */
  async getPickCounts(year: number): Promise<PickCountEntry[]> {
    const roster = await loadSeasonRoster(year, {
      draftOrderRepository: this.draftOrderRepository,
      pickRepository: this.pickRepository,
      candidateRepository: this.candidateRepository,
    });

    return roster.entries.map((entry) => ({
      player_id: entry.player_id,
      draft_position: entry.draft_position,
      pick_count: entry.picks.length,
      active_pick_count: countActivePicks(entry.picks, roster.candidates),
    }));
  }

  /**
   * Who drafts next for a year
   *
   * Fewest picks first, lower draft position on ties; players at the active
   * pick limit are skipped. Returns NO_ELIGIBLE_DRAFTER when nobody can draft.
   */
  async getNextDrafter(year: number): Promise<NextDrafterResult> {
    const next = selectNextDrafter(await this.getPickCounts(year));
    if (!next) {
      return { status: 'NO_ELIGIBLE_DRAFTER' };
    }

    const player = await this.playerRepository.findById(next.player_id);
    return {
      status: 'NEXT_DRAFTER',
      player_id: next.player_id,
      player_name: player?.name ?? '',
      draft_position: next.draft_position,
      pick_count: next.pick_count,
      active_pick_count: next.active_pick_count,
    };
  }

  /**
   * Commit a pick for a player
   *
   * @throws ValidationError if the name is blank or the year invalid
   * @throws NotFoundError if the player doesn't exist
   * @throws AlreadyDraftedError if any player already holds the candidate this year
   * @throws CapacityExceededError if the player has no free slot
   * @throws ConflictError if the capacity record kept changing underneath
   */
  async commitDraft(playerId: string, candidateName: string, year: number): Promise<CommitDraftResult> {
    const startedAt = Date.now();

    try {
      const result = await this.commit(playerId, candidateName, year);
      const latencyMs = Date.now() - startedAt;
      logDraftCommit({
        playerId,
        year,
        outcome: 'COMMITTED',
        candidateId: result.candidate_id,
        wasNewCandidate: result.was_new_candidate,
        latencyMs,
      });
      await emitDraftCommitLatency(year, 'COMMITTED', latencyMs);
      return result;
    } catch (error) {
      const outcome = outcomeOf(error);
      const latencyMs = Date.now() - startedAt;
      logDraftCommit({
        playerId,
        year,
        outcome,
        latencyMs,
        reason: error instanceof Error ? error.message : String(error),
      });
      await emitDraftCommitLatency(year, outcome, latencyMs);
      throw error;
    }
  }

  private async commit(playerId: string, candidateName: string, year: number): Promise<CommitDraftResult> {
    if (!Number.isInteger(year) || year < 1) {
      throw new ValidationError('Year must be a positive integer', { year });
    }
    const displayName = candidateName.trim().replace(/\s+/g, ' ');
    const normalizedName = normalizeName(displayName, this.matchingConfig);
    if (normalizedName === '') {
      throw new ValidationError('Candidate name is required');
    }

    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError(`Player not found: ${playerId}`);
    }

    const { candidate, wasNewCandidate } = await this.resolveCandidate(normalizedName, displayName);

    for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      // Read the version before the picks: any commit landing after this read
      // moves the version and fails our transaction
      const capacity = await this.draftCapacityRepository.find(playerId, year);
      const picks = await this.pickRepository.findByPlayerAndYear(playerId, year);
      if (picks.some((pick) => pick.candidate_id === candidate.id)) {
        throw new AlreadyDraftedError(candidate.id, year, playerId);
      }

      const pickCandidates =
        picks.length > 0
          ? await this.candidateRepository.findByIds(picks.map((pick) => pick.candidate_id))
          : new Map<string, Candidate>();

      // The capacity record is derived; picks are the source of truth
      const activePickCount = countActivePicks(picks, pickCandidates);
      if (activePickCount >= MAX_PICKS) {
        throw new CapacityExceededError(playerId, year, activePickCount, MAX_PICKS);
      }

      const timestamp = this.clock().toISOString();
      const values = createCapacityValues(
        playerId,
        year,
        activePickCount + (isDeceased(candidate) ? 0 : 1),
        timestamp
      );

      const outcome = await this.pickRepository.claimPick(
        { player_id: playerId, year, candidate_id: candidate.id, timestamp },
        { values, expectedVersion: capacity?.version ?? 0 }
      );

      switch (outcome) {
        case 'CLAIMED':
          return {
            player_id: playerId,
            year,
            candidate_id: candidate.id,
            candidate_name: candidate.name,
            was_new_candidate: wasNewCandidate,
            timestamp,
            active_pick_count: values.active_pick_count,
            available_slots: values.available_slots,
          };
        case 'ALREADY_CLAIMED': {
          const claim = await this.pickRepository.findClaim(year, candidate.id);
          throw new AlreadyDraftedError(candidate.id, year, claim?.player_id ?? 'unknown');
        }
        case 'PICK_EXISTS':
          throw new AlreadyDraftedError(candidate.id, year, playerId);
        case 'CAPACITY_CONFLICT':
          continue;
      }
    }

    throw new ConflictError(
      `Draft commit for player ${playerId} conflicted ${MAX_COMMIT_ATTEMPTS} times on the capacity record`
    );
  }

  /**
   * Reuse the closest existing candidate in the name bucket, else create one
   */
  private async resolveCandidate(normalizedName: string, displayName: string): Promise<ResolvedCandidate> {
    const claims = await this.candidateRepository.findByNameBucket(normalizedName);
    const best = findBestMatch(normalizedName, claims, (claim) => claim.normalized_name, this.matchingConfig);

    if (best) {
      const existing = await this.candidateRepository.findById(best.item.candidate_id);
      if (existing) {
        return { candidate: existing, wasNewCandidate: false };
      }
    }

    const { id, wasCreated } = await this.candidateRepository.createCandidateIfAbsent(normalizedName, {
      name: displayName,
    });
    if (wasCreated) {
      return {
        candidate: { id, name: displayName, normalized_name: normalizedName, age: 0 },
        wasNewCandidate: true,
      };
    }

    const existing = await this.candidateRepository.findById(id);
    if (!existing) {
      throw new ConflictError(`Candidate ${id} is claimed but has no details`);
    }
    return { candidate: existing, wasNewCandidate: false };
  }
}
