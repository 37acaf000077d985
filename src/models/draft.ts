/**
 * Draft Models
 *
 * Result shapes returned by the Draft Engine.
 */

/**
 * Answer to "who drafts next". Advisory: may be stale by one pick.
 */
export type NextDrafterResult =
  | {
      status: 'NEXT_DRAFTER';
      player_id: string;
      player_name: string;
      draft_position: number;
      pick_count: number;          // All picks for the year
      active_pick_count: number;   // Picks whose candidate is not deceased
    }
  | {
      status: 'NO_ELIGIBLE_DRAFTER';
    };

/**
 * Successful draft commit
 */
export interface CommitDraftResult {
  player_id: string;
  year: number;
  candidate_id: string;
  candidate_name: string;
  was_new_candidate: boolean;
  timestamp: string;
  active_pick_count: number;
  available_slots: number;
}

/**
 * Per-participant pick counts for a year
 */
export interface PickCountEntry {
  player_id: string;
  draft_position: number;
  pick_count: number;
  active_pick_count: number;
}
