/**
 * Scoring Service
 *
 * Computes scores and leaderboards from stored picks and candidates. Every
 * result is a pure function of stored state: the same store yields the same
 * leaderboard, in the same order.
 */

import { LeaderboardEntry } from '../models/leaderboard';
import { NotFoundError } from '../models/errors';
import { Candidate } from '../models/candidate';
import { CandidateRepository } from '../repositories/candidate-repository';
import { DraftOrderRepository } from '../repositories/draft-order-repository';
import { PickRepository } from '../repositories/pick-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { calculatePlayerScore, PlayerScore, rankLeaderboard } from '../utils/scoring-calculation';
import { loadSeasonRoster, SeasonRoster } from '../utils/season-roster';

export interface PlayerYearScore extends PlayerScore {
  player_id: string;
  year: number;
}

export class ScoringService {
  constructor(
    private playerRepository: PlayerRepository,
    private candidateRepository: CandidateRepository,
    private draftOrderRepository: DraftOrderRepository,
    private pickRepository: PickRepository
  ) {}

  /**
   * Score one player's picks for a year
   *
   * @throws NotFoundError if the player doesn't exist
   */
  async computeScore(playerId: string, year: number): Promise<PlayerYearScore> {
    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError(`Player not found: ${playerId}`);
    }

    const picks = await this.pickRepository.findByPlayerAndYear(playerId, year);
    const candidates =
      picks.length > 0
        ? await this.candidateRepository.findByIds(picks.map((pick) => pick.candidate_id))
        : new Map<string, Candidate>();

    return { player_id: playerId, year, ...calculatePlayerScore(picks, candidates, year) };
  }

  /**
   * Leaderboard over every participant of the year's draft order
   */
  async computeLeaderboard(year: number): Promise<LeaderboardEntry[]> {
    const roster = await loadSeasonRoster(year, {
      draftOrderRepository: this.draftOrderRepository,
      pickRepository: this.pickRepository,
      candidateRepository: this.candidateRepository,
    });
    return this.computeLeaderboardForRoster(roster);
  }

  /**
   * Leaderboard for an already loaded roster
   */
  async computeLeaderboardForRoster(roster: SeasonRoster): Promise<LeaderboardEntry[]> {
    if (roster.entries.length === 0) {
      return [];
    }

    const players = await this.playerRepository.findByIds(roster.entries.map((entry) => entry.player_id));

    return rankLeaderboard(
      roster.entries.map((entry) => ({
        player_id: entry.player_id,
        player_name: players.get(entry.player_id)?.name ?? '',
        draft_position: entry.draft_position,
        ...calculatePlayerScore(entry.picks, roster.candidates, roster.year),
      }))
    );
  }
}
