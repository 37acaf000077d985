/**
 * Carry-Forward Rules
 *
 * A pick survives into the new season unless its candidate died during the
 * outgoing year. Picks whose candidate record is missing are dropped.
 */

import { Candidate, getDeathYear, isDeceased } from '../models/candidate';
import { Pick } from '../models/pick';

export interface CarryForwardPartition {
  carry: Pick[];
  removed: Pick[];
}

export function isCarriedForward(candidate: Candidate | undefined, fromYear: number): boolean {
  if (!candidate) {
    return false;
  }
  return !isDeceased(candidate) || getDeathYear(candidate) !== fromYear;
}

export function partitionPicksForCarryForward(
  picks: Pick[],
  candidates: Map<string, Candidate>,
  fromYear: number
): CarryForwardPartition {
  const carry: Pick[] = [];
  const removed: Pick[] = [];
  for (const pick of picks) {
    if (isCarriedForward(candidates.get(pick.candidate_id), fromYear)) {
      carry.push(pick);
    } else {
      removed.push(pick);
    }
  }
  return { carry, removed };
}

/**
 * Timestamp given to picks created by the rollover
 */
export function carryForwardTimestamp(toYear: number): string {
  return `${toYear}-01-01T00:00:00.000Z`;
}
