/**
 * Deadpool Draft & Season-Transition Engine
 *
 * Main entry point. `createDeadpoolEngine()` wires repositories and services
 * over one entity store (DynamoDB unless another store is supplied).
 */

import { EnvironmentConfig, loadEnvironmentConfig, validateEnvironmentConfig } from './config/environment';
import { CommitDraftResult, NextDrafterResult, PickCountEntry } from './models/draft';
import { LeaderboardEntry } from './models/leaderboard';
import { TransitionOptions, TransitionReport } from './models/season-transition';
import { CandidateRepository } from './repositories/candidate-repository';
import { DraftCapacityRepository } from './repositories/draft-capacity-repository';
import { DraftOrderRepository } from './repositories/draft-order-repository';
import { DynamoDBEntityStore } from './repositories/dynamodb-entity-store';
import { EntityStore } from './repositories/entity-store';
import { PickRepository } from './repositories/pick-repository';
import { PlayerRepository } from './repositories/player-repository';
import { SeasonTransitionRepository } from './repositories/season-transition-repository';
import { DraftService } from './services/draft-service';
import { ScoringService } from './services/scoring-service';
import { SeasonTransitionService } from './services/season-transition-service';
import { DEFAULT_NAME_MATCHING_CONFIG } from './utils/name-matching';

export * from './config/environment';
export * from './models/errors';
export type { Candidate } from './models/candidate';
export type { CommitDraftResult, NextDrafterResult, PickCountEntry } from './models/draft';
export type { LeaderboardEntry } from './models/leaderboard';
export type { EntityStore, StoreItem, StoreKey, TransactionWrite, WriteCondition } from './repositories/entity-store';
export { TransitionStage, TransitionStatus } from './models/season-transition';
export type { TransitionOptions, TransitionReport } from './models/season-transition';
export { DynamoDBEntityStore } from './repositories/dynamodb-entity-store';
export { assertTransitionPassed } from './services/season-transition-service';
export { matchNames, normalizeName } from './utils/name-matching';

export interface DeadpoolEngineOptions {
  store?: EntityStore;
  config?: EnvironmentConfig;
  clock?: () => Date;
}

export interface DeadpoolEngine {
  getNextDrafter(year: number): Promise<NextDrafterResult>;
  commitDraft(playerId: string, candidateName: string, year: number): Promise<CommitDraftResult>;
  getLeaderboard(year: number): Promise<LeaderboardEntry[]>;
  runSeasonTransition(fromYear: number, toYear: number, options?: TransitionOptions): Promise<TransitionReport>;
  getPickCounts(year: number): Promise<PickCountEntry[]>;
}

export function createDeadpoolEngine(options: DeadpoolEngineOptions = {}): DeadpoolEngine {
  const config = options.config ?? loadEnvironmentConfig();
  validateEnvironmentConfig(config);

  const store = options.store ?? new DynamoDBEntityStore(undefined, config.dynamodbTableName);
  const clock = options.clock ?? (() => new Date());

  const playerRepository = new PlayerRepository(store);
  const candidateRepository = new CandidateRepository(store);
  const draftOrderRepository = new DraftOrderRepository(store);
  const pickRepository = new PickRepository(store);
  const draftCapacityRepository = new DraftCapacityRepository(store);
  const seasonTransitionRepository = new SeasonTransitionRepository(store);

  const draftService = new DraftService(
    playerRepository,
    candidateRepository,
    draftOrderRepository,
    pickRepository,
    draftCapacityRepository,
    { ...DEFAULT_NAME_MATCHING_CONFIG, similarityThreshold: config.nameSimilarityThreshold },
    clock
  );
  const scoringService = new ScoringService(
    playerRepository,
    candidateRepository,
    draftOrderRepository,
    pickRepository
  );
  const seasonTransitionService = new SeasonTransitionService(
    candidateRepository,
    draftOrderRepository,
    pickRepository,
    draftCapacityRepository,
    seasonTransitionRepository,
    scoringService,
    config.transitionConcurrency,
    clock
  );

  return {
    getNextDrafter: (year) => draftService.getNextDrafter(year),
    commitDraft: (playerId, candidateName, year) => draftService.commitDraft(playerId, candidateName, year),
    getLeaderboard: (year) => scoringService.computeLeaderboard(year),
    runSeasonTransition: (fromYear, toYear, transitionOptions) =>
      seasonTransitionService.runSeasonTransition(fromYear, toYear, transitionOptions),
    getPickCounts: (year) => draftService.getPickCounts(year),
  };
}
