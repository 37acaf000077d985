/**
 * Next Drafter Selection
 *
 * Eligible players have fewer than MAX_PICKS active picks. Among them the
 * one with the fewest picks for the year drafts next; ties go to the lower
 * draft position.
 */

import { MAX_PICKS } from '../models/draft-capacity';
import { PickCountEntry } from '../models/draft';

export function selectNextDrafter(entries: PickCountEntry[]): PickCountEntry | null {
  const eligible = entries.filter((entry) => entry.active_pick_count < MAX_PICKS);
  if (eligible.length === 0) {
    return null;
  }

  return eligible.reduce((best, entry) => {
    if (entry.pick_count !== best.pick_count) {
      return entry.pick_count < best.pick_count ? entry : best;
    }
    return entry.draft_position < best.draft_position ? entry : best;
  });
}
