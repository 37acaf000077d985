/**
 * Season Transition Service
 *
 * Rolls a finished season into the next one in idempotent stages:
 *
 * 1. COMPUTE_OUTGOING_LEADERBOARD - score the outgoing year (read-only)
 * 2. BUILD_DRAFT_ORDER - lowest outgoing score drafts first
 * 3. CARRY_FORWARD_PICKS - copy every pick whose candidate did not die in the
 *    outgoing year, claiming (toYear, candidate) conditionally
 * 4. RECORD_CAPACITY - write each player's capacity record for the new year
 * 5. VALIDATE - re-read the new year and check its invariants
 * 6. FINALIZE - write the transition record
 *
 * Per-player work runs with bounded concurrency; a player's failure is
 * recorded and the others continue. Re-running converges on the same state.
 * A dry run performs every read and computation, writes nothing, and
 * validates the projected state instead of the stored one.
 *
 * No live drafting for the new year may happen while a transition runs.
 */

import { Candidate, getDeathYear } from '../models/candidate';
import {
  createCapacityValues,
  DraftCapacityRecord,
  DraftCapacityValues,
  MAX_PICKS,
} from '../models/draft-capacity';
import { DraftOrderEntry } from '../models/draft-order';
import { ConflictError, NotFoundError, ValidationError, ValidationFailureError } from '../models/errors';
import { LeaderboardEntry } from '../models/leaderboard';
import { Pick, PickClaim } from '../models/pick';
import {
  CARRY_FORWARD_STRATEGY,
  PlayerTransitionResult,
  SeasonTransitionRecord,
  TransitionFailure,
  TransitionOptions,
  TransitionReport,
  TransitionStage,
  TransitionStatus,
} from '../models/season-transition';
import { CandidateRepository } from '../repositories/candidate-repository';
import { DraftCapacityRepository } from '../repositories/draft-capacity-repository';
import { DraftOrderRepository } from '../repositories/draft-order-repository';
import { PickRepository } from '../repositories/pick-repository';
import { SeasonTransitionRepository } from '../repositories/season-transition-repository';
import { carryForwardTimestamp, partitionPicksForCarryForward } from '../utils/carry-forward';
import { mapWithConcurrency } from '../utils/concurrency';
import { buildDraftOrderFromLeaderboard, validateDraftOrder } from '../utils/draft-order';
import { LogLevel, logTransitionStage } from '../utils/logger';
import { emitSeasonTransitionDuration } from '../utils/metrics';
import { countActivePicks, loadSeasonRoster, RosterEntry, SeasonRoster } from '../utils/season-roster';
import { ScoringService } from './scoring-service';

/**
 * Attempts at the versioned capacity write per player
 */
const CAPACITY_SAVE_ATTEMPTS = 3;

const STAGE_ORDER = Object.values(TransitionStage);

/**
 * Per-player outcome plus the state it leaves behind, used by validation
 */
interface PlayerOutcome {
  result: PlayerTransitionResult;
  expected_pick_count: number;
  projected_picks: Pick[];
  projected_capacity: DraftCapacityValues;
}

interface TransitionContext {
  fromYear: number;
  toYear: number;
  dryRun: boolean;
  verbose: boolean;
  startedAt: string;
  failures: TransitionFailure[];
  toYearClaims: Map<string, PickClaim>;
}

export class SeasonTransitionService {
  constructor(
    private candidateRepository: CandidateRepository,
    private draftOrderRepository: DraftOrderRepository,
    private pickRepository: PickRepository,
    private draftCapacityRepository: DraftCapacityRepository,
    private seasonTransitionRepository: SeasonTransitionRepository,
    private scoringService: ScoringService,
    private concurrency: number = 3,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Run the rollover from `fromYear` into `toYear`
   *
   * @throws ValidationError if toYear is not after fromYear
   * @throws NotFoundError if fromYear has no draft order
   */
  async runSeasonTransition(
    fromYear: number,
    toYear: number,
    options: TransitionOptions = {}
  ): Promise<TransitionReport> {
    if (!Number.isInteger(fromYear) || !Number.isInteger(toYear) || toYear <= fromYear) {
      throw new ValidationError(`Target year ${toYear} must be after source year ${fromYear}`, {
        fromYear,
        toYear,
      });
    }

    const started = this.clock();
    const ctx: TransitionContext = {
      fromYear,
      toYear,
      dryRun: options.dryRun ?? false,
      verbose: options.verbose ?? false,
      startedAt: started.toISOString(),
      failures: [],
      toYearClaims: new Map(),
    };

    const previous = await this.seasonTransitionRepository.find(fromYear, toYear);
    const roster = await loadSeasonRoster(fromYear, {
      draftOrderRepository: this.draftOrderRepository,
      pickRepository: this.pickRepository,
      candidateRepository: this.candidateRepository,
    });
    if (roster.entries.length === 0) {
      throw new NotFoundError(`No draft order found for ${fromYear}`);
    }

    const attempts = (previous?.attempts ?? 0) + 1;
    if (!ctx.dryRun) {
      await this.seasonTransitionRepository.save({
        ...this.emptyRecord(ctx, attempts),
        status: TransitionStatus.IN_PROGRESS,
      });
    }

    // 1. Outgoing leaderboard
    const leaderboard = await this.scoringService.computeLeaderboardForRoster(roster);
    this.logStage(ctx, TransitionStage.COMPUTE_OUTGOING_LEADERBOARD, 'Outgoing leaderboard computed', {
      players: leaderboard.length,
    });

    // 2. New draft order
    const draftOrder = await this.buildDraftOrder(ctx, leaderboard);

    // 3 + 4. Carry picks forward and record capacity, per player
    if (ctx.dryRun) {
      ctx.toYearClaims = await this.pickRepository.findClaimsByYear(toYear);
    }
    const positions = new Map(draftOrder.map((entry) => [entry.player_id, entry.position]));
    const outcomes = await mapWithConcurrency(roster.entries, this.concurrency, (entry) =>
      this.transitionPlayer(ctx, entry, roster, positions.get(entry.player_id) ?? 0)
    );
    const totals = {
      players: outcomes.length,
      picks_carried: outcomes.reduce((sum, outcome) => sum + outcome.result.picks_carried, 0),
      picks_removed: outcomes.reduce((sum, outcome) => sum + outcome.result.picks_removed, 0),
      failures: 0,
    };
    this.logStage(ctx, TransitionStage.RECORD_CAPACITY, 'Picks carried forward and capacity recorded', {
      picks_carried: totals.picks_carried,
      picks_removed: totals.picks_removed,
    });

    // 5. Validate
    const validationErrors = await this.validate(ctx, roster, draftOrder, outcomes);
    this.logStage(
      ctx,
      TransitionStage.VALIDATE,
      validationErrors.length === 0 ? 'Validation passed' : 'Validation failed',
      { errors: validationErrors.length },
      validationErrors.length === 0 ? LogLevel.INFO : LogLevel.WARN
    );

    // 6. Finalize
    const failures = [...ctx.failures].sort(
      (a, b) =>
        STAGE_ORDER.indexOf(a.stage) - STAGE_ORDER.indexOf(b.stage) ||
        (a.player_id ?? '').localeCompare(b.player_id ?? '') ||
        a.message.localeCompare(b.message)
    );
    totals.failures = failures.length;
    const status =
      failures.length === 0 && validationErrors.length === 0
        ? TransitionStatus.COMPLETED
        : TransitionStatus.COMPLETED_WITH_ERRORS;
    const completed = this.clock();

    if (!ctx.dryRun) {
      await this.seasonTransitionRepository.save({
        ...this.emptyRecord(ctx, attempts),
        status,
        players_processed: totals.players,
        picks_carried: totals.picks_carried,
        picks_removed: totals.picks_removed,
        failure_count: failures.length,
        validation_passed: validationErrors.length === 0,
        completed_at: completed.toISOString(),
      });
    }

    const durationMs = completed.getTime() - started.getTime();
    this.logStage(ctx, TransitionStage.FINALIZE, `Season transition ${status}`, {
      duration_ms: durationMs,
      failures: failures.length,
    });
    await emitSeasonTransitionDuration(fromYear, toYear, ctx.dryRun, durationMs);

    return {
      from_year: fromYear,
      to_year: toYear,
      dry_run: ctx.dryRun,
      status,
      previous_status: previous?.status,
      leaderboard,
      draft_order: draftOrder,
      players: outcomes.map((outcome) => outcome.result).sort((a, b) => a.draft_position - b.draft_position),
      totals,
      failures,
      validation: { passed: validationErrors.length === 0, errors: validationErrors },
      started_at: ctx.startedAt,
      completed_at: completed.toISOString(),
      duration_ms: durationMs,
    };
  }

  private async buildDraftOrder(ctx: TransitionContext, leaderboard: LeaderboardEntry[]): Promise<DraftOrderEntry[]> {
    const draftOrder = buildDraftOrderFromLeaderboard(ctx.toYear, leaderboard);
    if (ctx.dryRun) {
      this.logStage(ctx, TransitionStage.BUILD_DRAFT_ORDER, 'Draft order planned', { players: draftOrder.length });
      return draftOrder;
    }

    try {
      await this.draftOrderRepository.replaceYear(ctx.toYear, draftOrder);
      this.logStage(ctx, TransitionStage.BUILD_DRAFT_ORDER, 'Draft order written', { players: draftOrder.length });
    } catch (error) {
      this.recordFailure(ctx, TransitionStage.BUILD_DRAFT_ORDER, error);
    }
    return draftOrder;
  }

  /**
   * Carry one player's active picks into the new year and record capacity
   */
  private async transitionPlayer(
    ctx: TransitionContext,
    entry: RosterEntry,
    roster: SeasonRoster,
    newPosition: number
  ): Promise<PlayerOutcome> {
    const { carry, removed } = partitionPicksForCarryForward(entry.picks, roster.candidates, ctx.fromYear);
    const result: PlayerTransitionResult = {
      player_id: entry.player_id,
      draft_position: newPosition,
      picks_carried: 0,
      picks_already_present: 0,
      picks_removed: removed.length,
      active_pick_count: 0,
      available_slots: MAX_PICKS,
    };
    const projectedPicks: Pick[] = [];
    let stage = TransitionStage.CARRY_FORWARD_PICKS;

    try {
      const existing = await this.pickRepository.findByPlayerAndYear(entry.player_id, ctx.toYear);
      const existingIds = new Set(existing.map((pick) => pick.candidate_id));
      projectedPicks.push(...existing);

      for (const pick of carry) {
        const next: Pick = {
          player_id: entry.player_id,
          year: ctx.toYear,
          candidate_id: pick.candidate_id,
          timestamp: carryForwardTimestamp(ctx.toYear),
        };

        if (existingIds.has(pick.candidate_id)) {
          result.picks_already_present++;
          continue;
        }
        const carried = await this.carryPick(ctx, next);
        if (carried === 'CARRIED') {
          result.picks_carried++;
          projectedPicks.push(next);
        } else if (carried === 'ALREADY_PRESENT') {
          result.picks_already_present++;
          projectedPicks.push(next);
        }
      }

      // Same notion of active as draft commits reconcile to
      stage = TransitionStage.RECORD_CAPACITY;
      const candidates = await this.withCandidatesFor(projectedPicks, roster.candidates);
      const capacity = createCapacityValues(
        entry.player_id,
        ctx.toYear,
        countActivePicks(projectedPicks, candidates),
        ctx.startedAt
      );
      result.active_pick_count = capacity.active_pick_count;
      result.available_slots = capacity.available_slots;
      if (!ctx.dryRun) {
        await this.saveCapacity(capacity);
      }

      if (ctx.verbose) {
        this.logStage(ctx, stage, 'Player carried forward', {
          player_id: entry.player_id,
          picks_carried: result.picks_carried,
          picks_already_present: result.picks_already_present,
          picks_removed: result.picks_removed,
          available_slots: result.available_slots,
        });
      }

      return {
        result,
        expected_pick_count: carry.length,
        projected_picks: projectedPicks,
        projected_capacity: capacity,
      };
    } catch (error) {
      result.error = this.recordFailure(ctx, stage, error, entry.player_id);
      return {
        result,
        expected_pick_count: carry.length,
        projected_picks: projectedPicks,
        projected_capacity: createCapacityValues(
          entry.player_id,
          ctx.toYear,
          countActivePicks(projectedPicks, roster.candidates),
          ctx.startedAt
        ),
      };
    }
  }

  /**
   * Claim and write one carried pick. A claim the player already holds
   * counts as carried by an earlier run; a claim held by someone else is a
   * per-pick failure.
   */
  private async carryPick(ctx: TransitionContext, pick: Pick): Promise<'CARRIED' | 'ALREADY_PRESENT' | 'FAILED'> {
    if (ctx.dryRun) {
      const claim = ctx.toYearClaims.get(pick.candidate_id);
      if (!claim) {
        return 'CARRIED';
      }
      return this.resolveExistingClaim(ctx, pick, claim);
    }

    const outcome = await this.pickRepository.claimPick(pick);
    switch (outcome) {
      case 'CLAIMED':
        return 'CARRIED';
      case 'PICK_EXISTS':
        return 'ALREADY_PRESENT';
      case 'ALREADY_CLAIMED':
      case 'CAPACITY_CONFLICT': {
        const claim = await this.pickRepository.findClaim(pick.year, pick.candidate_id);
        if (!claim) {
          throw new ConflictError(`Claim for ${pick.candidate_id} in ${pick.year} changed during transition`);
        }
        return this.resolveExistingClaim(ctx, pick, claim);
      }
    }
  }

  private resolveExistingClaim(
    ctx: TransitionContext,
    pick: Pick,
    claim: PickClaim
  ): 'ALREADY_PRESENT' | 'FAILED' {
    if (claim.player_id === pick.player_id) {
      return 'ALREADY_PRESENT';
    }
    ctx.failures.push({
      stage: TransitionStage.CARRY_FORWARD_PICKS,
      player_id: pick.player_id,
      message: `Candidate ${pick.candidate_id} is already claimed for ${pick.year} by player ${claim.player_id}`,
    });
    return 'FAILED';
  }

  /**
   * `known` extended with the candidates of `picks` it lacks
   */
  private async withCandidatesFor(picks: Pick[], known: Map<string, Candidate>): Promise<Map<string, Candidate>> {
    const missing = [...new Set(picks.map((pick) => pick.candidate_id))].filter((id) => !known.has(id));
    if (missing.length === 0) {
      return known;
    }
    const candidates = new Map<string, Candidate>(known);
    for (const [id, candidate] of await this.candidateRepository.findByIds(missing)) {
      candidates.set(id, candidate);
    }
    return candidates;
  }

  /**
   * Overwrite the capacity record, re-reading its version on conflict
   */
  private async saveCapacity(values: DraftCapacityValues): Promise<void> {
    for (let attempt = 1; attempt <= CAPACITY_SAVE_ATTEMPTS; attempt++) {
      const current = await this.draftCapacityRepository.find(values.player_id, values.year);
      if (await this.draftCapacityRepository.save(values, current?.version ?? 0)) {
        return;
      }
    }
    throw new ConflictError(
      `Capacity record for player ${values.player_id} in ${values.year} kept changing`
    );
  }

  /**
   * Check the new year's invariants against stored state, or the projected
   * state for a dry run
   */
  private async validate(
    ctx: TransitionContext,
    roster: SeasonRoster,
    draftOrder: DraftOrderEntry[],
    outcomes: PlayerOutcome[]
  ): Promise<string[]> {
    const errors: string[] = [];

    const storedOrder = ctx.dryRun ? draftOrder : await this.draftOrderRepository.findByYear(ctx.toYear);
    errors.push(...validateDraftOrder(storedOrder, roster.entries.map((entry) => entry.player_id)));

    const toYearPicks = new Map<string, Pick[]>();
    const capacities = new Map<string, DraftCapacityValues | DraftCapacityRecord | null>();
    for (const outcome of outcomes) {
      const playerId = outcome.result.player_id;
      if (ctx.dryRun) {
        toYearPicks.set(playerId, outcome.projected_picks);
        capacities.set(playerId, outcome.projected_capacity);
      } else {
        toYearPicks.set(playerId, await this.pickRepository.findByPlayerAndYear(playerId, ctx.toYear));
        capacities.set(playerId, await this.draftCapacityRepository.find(playerId, ctx.toYear));
      }
    }

    const candidates = await this.withCandidatesFor([...toYearPicks.values()].flat(), roster.candidates);

    for (const outcome of outcomes) {
      const playerId = outcome.result.player_id;
      const picks = toYearPicks.get(playerId) ?? [];

      if (picks.length !== outcome.expected_pick_count) {
        errors.push(
          `Player ${playerId} has ${picks.length} picks for ${ctx.toYear}, expected ${outcome.expected_pick_count}`
        );
      }

      for (const pick of picks) {
        const candidate = candidates.get(pick.candidate_id);
        if (candidate && getDeathYear(candidate) === ctx.fromYear) {
          errors.push(
            `Player ${playerId} carried candidate ${pick.candidate_id} who died in ${ctx.fromYear}`
          );
        }
      }

      const capacity = capacities.get(playerId);
      const active = countActivePicks(picks, candidates);
      if (!capacity) {
        errors.push(`Player ${playerId} has no capacity record for ${ctx.toYear}`);
      } else if (
        capacity.max_picks !== MAX_PICKS ||
        capacity.active_pick_count !== active ||
        capacity.available_slots !== MAX_PICKS - active
      ) {
        errors.push(
          `Player ${playerId} capacity record (${capacity.active_pick_count} active, ` +
            `${capacity.available_slots} available) does not match ${active} active picks`
        );
      }
    }

    return errors;
  }

  private emptyRecord(ctx: TransitionContext, attempts: number): SeasonTransitionRecord {
    return {
      from_year: ctx.fromYear,
      to_year: ctx.toYear,
      strategy: CARRY_FORWARD_STRATEGY,
      status: TransitionStatus.IN_PROGRESS,
      attempts,
      players_processed: 0,
      picks_carried: 0,
      picks_removed: 0,
      failure_count: 0,
      validation_passed: false,
      started_at: ctx.startedAt,
    };
  }

  private recordFailure(ctx: TransitionContext, stage: TransitionStage, error: unknown, playerId?: string): string {
    const message = error instanceof Error ? error.message : String(error);
    ctx.failures.push({ stage, player_id: playerId, message });
    this.logStage(ctx, stage, 'Stage failed', { player_id: playerId, error: message }, LogLevel.ERROR);
    return message;
  }

  private logStage(
    ctx: TransitionContext,
    stage: TransitionStage,
    message: string,
    context?: Record<string, unknown>,
    level?: LogLevel
  ): void {
    logTransitionStage({
      fromYear: ctx.fromYear,
      toYear: ctx.toYear,
      stage,
      dryRun: ctx.dryRun,
      message,
      level,
      context,
    });
  }
}

/**
 * Throw when a transition report did not pass validation
 */
export function assertTransitionPassed(report: TransitionReport): void {
  if (!report.validation.passed || report.failures.length > 0) {
    const errors = [
      ...report.failures.map((failure) => `${failure.stage}: ${failure.message}`),
      ...report.validation.errors,
    ];
    throw new ValidationFailureError(
      `Season transition ${report.from_year} to ${report.to_year} finished with ${errors.length} problem(s)`,
      errors
    );
  }
}
