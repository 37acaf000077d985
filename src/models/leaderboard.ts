/**
 * Leaderboard Models
 */

/**
 * One participant's standing for a year
 */
export interface LeaderboardEntry {
  rank: number;                  // Competition ranking: equal scores share a rank
  player_id: string;
  player_name: string;
  draft_position: number;
  score: number;
  pick_count: number;
  deceased_count: number;        // Picks whose candidate died in the scored year
}
