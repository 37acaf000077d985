/**
 * Draft Order Utilities
 *
 * The lowest outgoing score drafts first in the new season. Equal scores keep
 * their relative order from the outgoing season (lower prior position first).
 */

import { DraftOrderEntry } from '../models/draft-order';
import { LeaderboardEntry } from '../models/leaderboard';

/**
 * Build the draft order for `year` from the outgoing leaderboard
 */
export function buildDraftOrderFromLeaderboard(
  year: number,
  leaderboard: LeaderboardEntry[]
): DraftOrderEntry[] {
  return [...leaderboard]
    .sort(
      (a, b) =>
        a.score - b.score ||
        a.draft_position - b.draft_position ||
        a.player_id.localeCompare(b.player_id)
    )
    .map((entry, index) => ({
      year,
      position: index + 1,
      player_id: entry.player_id,
    }));
}

/**
 * Check that positions are exactly 1..N over exactly the given participants
 *
 * @returns One message per violation; empty when the order is valid
 */
export function validateDraftOrder(entries: DraftOrderEntry[], participantIds: string[]): string[] {
  const errors: string[] = [];

  if (entries.length !== participantIds.length) {
    errors.push(`Draft order has ${entries.length} entries for ${participantIds.length} participants`);
  }

  const positions = entries.map((entry) => entry.position).sort((a, b) => a - b);
  positions.forEach((position, index) => {
    if (position !== index + 1) {
      errors.push(`Draft order position ${index + 1} is ${position}`);
    }
  });

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.player_id)) {
      errors.push(`Player ${entry.player_id} appears more than once in the draft order`);
    }
    seen.add(entry.player_id);
  }

  for (const playerId of participantIds) {
    if (!seen.has(playerId)) {
      errors.push(`Player ${playerId} is missing from the draft order`);
    }
  }
  const participants = new Set(participantIds);
  for (const playerId of seen) {
    if (!participants.has(playerId)) {
      errors.push(`Player ${playerId} is in the draft order but did not participate`);
    }
  }

  return errors;
}
