/**
 * Next Drafter Selection Tests
 */

import { selectNextDrafter } from '../../src/utils/draft-selection';

function entry(playerId: string, draftPosition: number, pickCount: number, activePickCount = pickCount) {
  return {
    player_id: playerId,
    draft_position: draftPosition,
    pick_count: pickCount,
    active_pick_count: activePickCount,
  };
}

describe('selectNextDrafter', () => {
  it('should choose the fewest picks first', () => {
    expect(selectNextDrafter([entry('p-1', 1, 3), entry('p-2', 2, 2), entry('p-3', 3, 3)])?.player_id).toBe('p-2');
  });

  it('should break ties by draft position', () => {
    expect(selectNextDrafter([entry('p-3', 3, 1), entry('p-1', 1, 1), entry('p-2', 2, 1)])?.player_id).toBe('p-1');
  });

  it('should skip players at the active pick limit', () => {
    expect(selectNextDrafter([entry('p-1', 1, 20), entry('p-2', 2, 21, 19)])?.player_id).toBe('p-2');
  });

  it('should return null when nobody is eligible', () => {
    expect(selectNextDrafter([entry('p-1', 1, 20)])).toBeNull();
    expect(selectNextDrafter([])).toBeNull();
  });
});
