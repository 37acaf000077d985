/**
 * Player Repository
 *
 * Read-only access to player profiles.
 */

import { mapPlayerItem, Player } from '../models/player';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore } from './entity-store';
import { playerKey } from './keys';

export class PlayerRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  /**
   * Find player by ID
   *
   * @returns Player if found, null otherwise
   */
  async findById(playerId: string): Promise<Player | null> {
    const item = await this.store.get(playerKey(playerId));
    return item ? mapPlayerItem(item) : null;
  }

  /**
   * Find many players in one batch, keyed by player ID.
   * Unknown IDs are absent from the result.
   */
  async findByIds(playerIds: string[]): Promise<Map<string, Player>> {
    const items = await this.store.batchGet(playerIds.map(playerKey));
    const players = new Map<string, Player>();
    for (const item of items) {
      const player = mapPlayerItem(item);
      if (player) {
        players.set(player.id, player);
      }
    }
    return players;
  }
}
