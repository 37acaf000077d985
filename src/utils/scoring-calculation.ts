/**
 * Scoring Calculation Utilities
 *
 * Scoring Rules:
 * - A pick scores 50 + (100 - age) when its candidate died in the scored year
 * - Any other pick scores 0
 * - Missing ages count as 0, so such a death scores 150
 *
 * Leaderboard order: score descending, then draft position ascending.
 * Ranks use competition ranking (1, 2, 2, 4).
 */

import { Candidate, getDeathYear } from '../models/candidate';
import { LeaderboardEntry } from '../models/leaderboard';
import { Pick } from '../models/pick';

export const DEATH_BASE_POINTS = 50;
export const AGE_BONUS_CEILING = 100;

/**
 * Score a single pick's candidate for a year
 */
export function calculatePickScore(candidate: Candidate | undefined, year: number): number {
  if (!candidate || getDeathYear(candidate) !== year) {
    return 0;
  }
  return DEATH_BASE_POINTS + (AGE_BONUS_CEILING - candidate.age);
}

export interface PlayerScore {
  score: number;
  pick_count: number;
  deceased_count: number;
}

/**
 * Sum a player's picks for a year
 */
export function calculatePlayerScore(
  picks: Pick[],
  candidates: Map<string, Candidate>,
  year: number
): PlayerScore {
  let score = 0;
  let deceasedCount = 0;

  for (const pick of picks) {
    const candidate = candidates.get(pick.candidate_id);
    if (candidate && getDeathYear(candidate) === year) {
      deceasedCount++;
    }
    score += calculatePickScore(candidate, year);
  }

  return { score, pick_count: picks.length, deceased_count: deceasedCount };
}

/**
 * Sort leaderboard rows and assign competition ranks
 */
export function rankLeaderboard(rows: Omit<LeaderboardEntry, 'rank'>[]): LeaderboardEntry[] {
  const sorted = [...rows].sort(
    (a, b) =>
      b.score - a.score ||
      a.draft_position - b.draft_position ||
      a.player_id.localeCompare(b.player_id)
  );

  const ranked: LeaderboardEntry[] = [];
  sorted.forEach((row, index) => {
    const previous = ranked[index - 1];
    const rank = previous && previous.score === row.score ? previous.rank : index + 1;
    ranked.push({ rank, ...row });
  });
  return ranked;
}
