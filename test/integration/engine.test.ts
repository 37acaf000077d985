/**
 * Engine Integration Tests
 *
 * Drives the public engine facade over the in-memory store through one
 * season: drafting, scoring and the rollover into the next year.
 */

import { EnvironmentConfig } from '../../src/config/environment';
import { AlreadyDraftedError, createDeadpoolEngine, DeadpoolEngine, TransitionStatus } from '../../src/index';
import { candidateKey } from '../../src/repositories/keys';
import { seedDraftOrder, seedPlayer } from '../support/fixtures';
import { InMemoryEntityStore } from '../support/in-memory-entity-store';

jest.mock('../../src/utils/metrics');

const config: EnvironmentConfig = {
  dynamodbTableName: 'Deadpool-test',
  awsRegion: 'us-east-1',
  dynamodbMaxAttempts: 3,
  nameSimilarityThreshold: 0.85,
  transitionConcurrency: 2,
  logLevel: 'error',
  nodeEnv: 'test',
};

describe('Deadpool engine', () => {
  let store: InMemoryEntityStore;
  let engine: DeadpoolEngine;

  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    store = new InMemoryEntityStore();
    seedPlayer(store, 'p-1', 'Ada', 'One');
    seedPlayer(store, 'p-2', 'Bea', 'Two');
    seedDraftOrder(store, 2025, ['p-1', 'p-2']);
    engine = createDeadpoolEngine({ store, config, clock: () => new Date('2025-01-20T12:00:00.000Z') });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should reject an invalid configuration', () => {
    expect(() => createDeadpoolEngine({ store, config: { ...config, transitionConcurrency: 0 } })).toThrow(
      'TRANSITION_CONCURRENCY must be a positive integer'
    );
  });

  it('should run a season from draft to rollover', async () => {
    await expect(engine.getNextDrafter(2025)).resolves.toMatchObject({ player_id: 'p-1', draft_position: 1 });

    const betty = await engine.commitDraft('p-1', 'Betty White', 2025);
    await expect(engine.getNextDrafter(2025)).resolves.toMatchObject({ player_id: 'p-2', pick_count: 0 });

    await expect(engine.commitDraft('p-2', 'betty white', 2025)).rejects.toBeInstanceOf(AlreadyDraftedError);
    await engine.commitDraft('p-2', 'Bob Barker', 2025);

    await expect(engine.getPickCounts(2025)).resolves.toEqual([
      { player_id: 'p-1', draft_position: 1, pick_count: 1, active_pick_count: 1 },
      { player_id: 'p-2', draft_position: 2, pick_count: 1, active_pick_count: 1 },
    ]);

    const candidate = store.peek(candidateKey(betty.candidate_id));
    if (!candidate) {
      throw new Error('candidate missing');
    }
    store.seed({ ...candidate, Age: 99, DeathDate: '2025-06-01' });

    const leaderboard = await engine.getLeaderboard(2025);
    expect(leaderboard.map((entry) => [entry.rank, entry.player_id, entry.score])).toEqual([
      [1, 'p-1', 51],
      [2, 'p-2', 0],
    ]);

    const report = await engine.runSeasonTransition(2025, 2026);
    expect(report.status).toBe(TransitionStatus.COMPLETED);
    expect(report.draft_order.map((entry) => entry.player_id)).toEqual(['p-2', 'p-1']);

    await expect(engine.getPickCounts(2026)).resolves.toEqual([
      { player_id: 'p-2', draft_position: 1, pick_count: 1, active_pick_count: 1 },
      { player_id: 'p-1', draft_position: 2, pick_count: 0, active_pick_count: 0 },
    ]);
    await expect(engine.getNextDrafter(2026)).resolves.toMatchObject({
      status: 'NEXT_DRAFTER',
      player_id: 'p-1',
      player_name: 'Ada One',
      draft_position: 2,
    });
  });
});
