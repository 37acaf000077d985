/**
 * Draft Order Utility Tests
 */

import { LeaderboardEntry } from '../../src/models/leaderboard';
import { buildDraftOrderFromLeaderboard, validateDraftOrder } from '../../src/utils/draft-order';

function row(playerId: string, draftPosition: number, score: number): LeaderboardEntry {
  return {
    rank: 0,
    player_id: playerId,
    player_name: playerId,
    draft_position: draftPosition,
    score,
    pick_count: 0,
    deceased_count: 0,
  };
}

describe('Draft Order Utilities', () => {
  describe('buildDraftOrderFromLeaderboard', () => {
    it('should give the lowest score the first pick and break ties by prior position', () => {
      const order = buildDraftOrderFromLeaderboard(2026, [
        row('p-1', 1, 200),
        row('p-2', 2, 0),
        row('p-3', 3, 80),
        row('p-4', 4, 0),
      ]);

      expect(order).toEqual([
        { year: 2026, position: 1, player_id: 'p-2' },
        { year: 2026, position: 2, player_id: 'p-4' },
        { year: 2026, position: 3, player_id: 'p-3' },
        { year: 2026, position: 4, player_id: 'p-1' },
      ]);
    });
  });

  describe('validateDraftOrder', () => {
    it('should accept a permutation of 1..N over the participants', () => {
      const entries = [
        { year: 2026, position: 2, player_id: 'p-1' },
        { year: 2026, position: 1, player_id: 'p-2' },
      ];

      expect(validateDraftOrder(entries, ['p-1', 'p-2'])).toEqual([]);
    });

    it('should report gaps, duplicates and missing players', () => {
      const entries = [
        { year: 2026, position: 1, player_id: 'p-1' },
        { year: 2026, position: 3, player_id: 'p-1' },
      ];

      expect(validateDraftOrder(entries, ['p-1', 'p-2'])).toEqual([
        'Draft order position 2 is 3',
        'Player p-1 appears more than once in the draft order',
        'Player p-2 is missing from the draft order',
      ]);
    });
  });
});
