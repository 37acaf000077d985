/**
 * Scoring Service Tests
 */

import { NotFoundError } from '../../src/models/errors';
import { CandidateRepository } from '../../src/repositories/candidate-repository';
import { DraftOrderRepository } from '../../src/repositories/draft-order-repository';
import { PickRepository } from '../../src/repositories/pick-repository';
import { PlayerRepository } from '../../src/repositories/player-repository';
import { ScoringService } from '../../src/services/scoring-service';
import { seedCandidate, seedDraftOrder, seedPick, seedPlayer } from '../support/fixtures';
import { InMemoryEntityStore } from '../support/in-memory-entity-store';

describe('ScoringService', () => {
  let store: InMemoryEntityStore;
  let service: ScoringService;

  beforeEach(() => {
    store = new InMemoryEntityStore();
    service = new ScoringService(
      new PlayerRepository(store),
      new CandidateRepository(store),
      new DraftOrderRepository(store),
      new PickRepository(store)
    );

    seedPlayer(store, 'p-1', 'Ada', 'One');
    seedPlayer(store, 'p-2', 'Bea', 'Two');
    seedPlayer(store, 'p-3', 'Cy', 'Three');
    seedDraftOrder(store, 2025, ['p-1', 'p-2', 'p-3']);

    seedCandidate(store, { id: 'c-1', name: 'Alpha Person', age: 70, deathDate: '2025-04-01' });
    seedCandidate(store, { id: 'c-2', name: 'Beta Person', age: 90, deathDate: '2025-08-15' });
    seedCandidate(store, { id: 'c-3', name: 'Gamma Person', age: 60 });
    seedCandidate(store, { id: 'c-4', name: 'Delta Person', age: 85, deathDate: '2024-12-30' });
    seedCandidate(store, { id: 'c-5', name: 'Epsilon Person', age: 20, deathDate: '2025-02-02' });

    seedPick(store, 'p-1', 2025, 'c-1');
    seedPick(store, 'p-1', 2025, 'c-3');
    seedPick(store, 'p-2', 2025, 'c-2');
    seedPick(store, 'p-2', 2025, 'c-4');
    seedPick(store, 'p-3', 2025, 'c-5');
  });

  describe('computeScore', () => {
    it('should score 80 for a 70-year-old who died in the year', async () => {
      await expect(service.computeScore('p-1', 2025)).resolves.toEqual({
        player_id: 'p-1',
        year: 2025,
        score: 80,
        pick_count: 2,
        deceased_count: 1,
      });
    });

    it('should not score deaths from other years', async () => {
      await expect(service.computeScore('p-2', 2025)).resolves.toMatchObject({ score: 60, deceased_count: 1 });
    });

    it('should score a player with no picks as 0', async () => {
      await expect(service.computeScore('p-1', 2026)).resolves.toMatchObject({ score: 0, pick_count: 0 });
    });

    it('should reject unknown players', async () => {
      await expect(service.computeScore('p-404', 2025)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('computeLeaderboard', () => {
    it('should rank every participant by score', async () => {
      const leaderboard = await service.computeLeaderboard(2025);

      expect(leaderboard).toEqual([
        { rank: 1, player_id: 'p-3', player_name: 'Cy Three', draft_position: 3, score: 130, pick_count: 1, deceased_count: 1 },
        { rank: 2, player_id: 'p-1', player_name: 'Ada One', draft_position: 1, score: 80, pick_count: 2, deceased_count: 1 },
        { rank: 3, player_id: 'p-2', player_name: 'Bea Two', draft_position: 2, score: 60, pick_count: 2, deceased_count: 1 },
      ]);
    });

    it('should be deterministic', async () => {
      const first = await service.computeLeaderboard(2025);
      const second = await service.computeLeaderboard(2025);

      expect(second).toEqual(first);
    });

    it('should break score ties by draft position', async () => {
      seedDraftOrder(store, 2026, ['p-3', 'p-1']);

      const leaderboard = await service.computeLeaderboard(2026);

      expect(leaderboard.map((entry) => [entry.rank, entry.player_id])).toEqual([
        [1, 'p-3'],
        [1, 'p-1'],
      ]);
    });

    it('should be empty for a year without participants', async () => {
      await expect(service.computeLeaderboard(2030)).resolves.toEqual([]);
    });
  });
});
