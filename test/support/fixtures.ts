/**
 * Store seeding helpers for engine tests
 */

import { buildCandidateItem, buildNameClaimItem } from '../../src/models/candidate';
import { buildDraftCapacityItem, createCapacityValues } from '../../src/models/draft-capacity';
import { buildDraftOrderItem } from '../../src/models/draft-order';
import { buildPickClaimItem, buildPickItem } from '../../src/models/pick';
import { playerKey } from '../../src/repositories/keys';
import { normalizeName } from '../../src/utils/name-matching';
import { InMemoryEntityStore } from './in-memory-entity-store';

export function seedPlayer(store: InMemoryEntityStore, id: string, firstName: string, lastName: string): void {
  store.seed({ ...playerKey(id), FirstName: firstName, LastName: lastName });
}

export function seedCandidate(
  store: InMemoryEntityStore,
  candidate: { id: string; name: string; age?: number; deathDate?: string }
): void {
  const normalizedName = normalizeName(candidate.name);
  store.seed(buildNameClaimItem(candidate.id, normalizedName, candidate.name));
  store.seed({
    ...buildCandidateItem(candidate.id, normalizedName, { name: candidate.name, age: candidate.age }),
    DeathDate: candidate.deathDate,
  });
}

/**
 * Positions follow the order of `playerIds`, starting at 1
 */
export function seedDraftOrder(store: InMemoryEntityStore, year: number, playerIds: string[]): void {
  playerIds.forEach((playerId, index) => {
    store.seed(buildDraftOrderItem({ year, position: index + 1, player_id: playerId }));
  });
}

export function seedPick(
  store: InMemoryEntityStore,
  playerId: string,
  year: number,
  candidateId: string,
  timestamp = `${year}-02-01T00:00:00.000Z`
): void {
  const pick = { player_id: playerId, year, candidate_id: candidateId, timestamp };
  store.seed(buildPickItem(pick));
  store.seed(buildPickClaimItem(pick));
}

export function seedCapacity(
  store: InMemoryEntityStore,
  playerId: string,
  year: number,
  activePickCount: number,
  version: number
): void {
  store.seed(
    buildDraftCapacityItem(
      createCapacityValues(playerId, year, activePickCount, `${year}-02-01T00:00:00.000Z`),
      version
    )
  );
}
