/**
 * Season Transition Models
 *
 * Type definitions for the year-end rollover: the persisted transition
 * record and the report returned to the caller.
 */

import { readNumber, readString, StoreItem } from '../repositories/entity-store';
import { seasonTransitionKey } from '../repositories/keys';
import { DraftOrderEntry } from './draft-order';
import { LeaderboardEntry } from './leaderboard';

/**
 * Transition stages, in execution order
 */
export enum TransitionStage {
  COMPUTE_OUTGOING_LEADERBOARD = 'COMPUTE_OUTGOING_LEADERBOARD',
  BUILD_DRAFT_ORDER = 'BUILD_DRAFT_ORDER',
  CARRY_FORWARD_PICKS = 'CARRY_FORWARD_PICKS',
  RECORD_CAPACITY = 'RECORD_CAPACITY',
  VALIDATE = 'VALIDATE',
  FINALIZE = 'FINALIZE',
}

export enum TransitionStatus {
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  COMPLETED_WITH_ERRORS = 'COMPLETED_WITH_ERRORS',
}

export const CARRY_FORWARD_STRATEGY = 'ACTIVE_PICKS_ONLY';

/**
 * Persisted transition record, MIGRATION#{from}_TO_{to}/METADATA
 */
export interface SeasonTransitionRecord {
  from_year: number;
  to_year: number;
  strategy: string;
  status: TransitionStatus;
  attempts: number;
  players_processed: number;
  picks_carried: number;
  picks_removed: number;
  failure_count: number;
  validation_passed: boolean;
  started_at: string;
  completed_at?: string;
}

export interface TransitionFailure {
  stage: TransitionStage;
  player_id?: string;
  message: string;
}

/**
 * Outcome of carrying one player into the new season
 */
export interface PlayerTransitionResult {
  player_id: string;
  draft_position: number;
  picks_carried: number;
  picks_already_present: number;   // Carried by an earlier run
  picks_removed: number;
  active_pick_count: number;
  available_slots: number;
  error?: string;
}

export interface TransitionTotals {
  players: number;
  picks_carried: number;
  picks_removed: number;
  failures: number;
}

export interface TransitionOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

export interface TransitionReport {
  from_year: number;
  to_year: number;
  dry_run: boolean;
  status: TransitionStatus;
  previous_status?: TransitionStatus;
  leaderboard: LeaderboardEntry[];
  draft_order: DraftOrderEntry[];
  players: PlayerTransitionResult[];
  totals: TransitionTotals;
  failures: TransitionFailure[];
  validation: {
    passed: boolean;
    errors: string[];
  };
  started_at: string;
  completed_at: string;
  duration_ms: number;
}

function parseTransitionStatus(value: string | undefined): TransitionStatus | null {
  switch (value) {
    case TransitionStatus.IN_PROGRESS:
      return TransitionStatus.IN_PROGRESS;
    case TransitionStatus.COMPLETED:
      return TransitionStatus.COMPLETED;
    case TransitionStatus.COMPLETED_WITH_ERRORS:
      return TransitionStatus.COMPLETED_WITH_ERRORS;
    default:
      return null;
  }
}

/**
 * Convert a stored transition item to a SeasonTransitionRecord
 */
export function mapSeasonTransitionItem(
  fromYear: number,
  toYear: number,
  item: StoreItem
): SeasonTransitionRecord | null {
  const status = parseTransitionStatus(readString(item, 'Status'));
  if (!status) {
    return null;
  }
  return {
    from_year: fromYear,
    to_year: toYear,
    strategy: readString(item, 'Strategy') ?? CARRY_FORWARD_STRATEGY,
    status,
    attempts: readNumber(item, 'Attempts') ?? 0,
    players_processed: readNumber(item, 'PlayersProcessed') ?? 0,
    picks_carried: readNumber(item, 'PicksCarried') ?? 0,
    picks_removed: readNumber(item, 'PicksRemoved') ?? 0,
    failure_count: readNumber(item, 'FailureCount') ?? 0,
    validation_passed: item.ValidationPassed === true,
    started_at: readString(item, 'StartedAt') ?? '',
    completed_at: readString(item, 'CompletedAt'),
  };
}

export function buildSeasonTransitionItem(record: SeasonTransitionRecord): StoreItem {
  return {
    ...seasonTransitionKey(record.from_year, record.to_year),
    Type: 'Migration',
    FromYear: record.from_year,
    ToYear: record.to_year,
    Strategy: record.strategy,
    Status: record.status,
    Attempts: record.attempts,
    PlayersProcessed: record.players_processed,
    PicksCarried: record.picks_carried,
    PicksRemoved: record.picks_removed,
    FailureCount: record.failure_count,
    ValidationPassed: record.validation_passed,
    StartedAt: record.started_at,
    CompletedAt: record.completed_at,
  };
}
