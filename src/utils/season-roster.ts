/**
 * Season Roster Loading
 *
 * Loads a year's participants (its draft order), their picks and every
 * candidate those picks reference. Shared by drafting, scoring and the
 * season transition so all three read the same state the same way.
 */

import { Candidate, isDeceased } from '../models/candidate';
import { Pick } from '../models/pick';
import { CandidateRepository } from '../repositories/candidate-repository';
import { DraftOrderRepository } from '../repositories/draft-order-repository';
import { PickRepository } from '../repositories/pick-repository';

export interface RosterEntry {
  player_id: string;
  draft_position: number;
  picks: Pick[];
}

export interface SeasonRoster {
  year: number;
  entries: RosterEntry[];            // Draft order, position ascending
  candidates: Map<string, Candidate>;
}

export interface RosterRepositories {
  draftOrderRepository: DraftOrderRepository;
  pickRepository: PickRepository;
  candidateRepository: CandidateRepository;
}

export async function loadSeasonRoster(year: number, repositories: RosterRepositories): Promise<SeasonRoster> {
  const order = await repositories.draftOrderRepository.findByYear(year);

  const entries = await Promise.all(
    order.map(async (entry) => ({
      player_id: entry.player_id,
      draft_position: entry.position,
      picks: await repositories.pickRepository.findByPlayerAndYear(entry.player_id, year),
    }))
  );

  const candidateIds = [...new Set(entries.flatMap((entry) => entry.picks.map((pick) => pick.candidate_id)))];
  const candidates =
    candidateIds.length > 0
      ? await repositories.candidateRepository.findByIds(candidateIds)
      : new Map<string, Candidate>();

  return { year, entries, candidates };
}

/**
 * Picks whose candidate is known and not deceased
 */
export function countActivePicks(picks: Pick[], candidates: Map<string, Candidate>): number {
  return picks.filter((pick) => {
    const candidate = candidates.get(pick.candidate_id);
    return candidate !== undefined && !isDeceased(candidate);
  }).length;
}
