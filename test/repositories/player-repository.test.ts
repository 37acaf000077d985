/**
 * Player Repository Tests
 */

import { PlayerRepository } from '../../src/repositories/player-repository';
import { seedPlayer } from '../support/fixtures';
import { InMemoryEntityStore } from '../support/in-memory-entity-store';

describe('PlayerRepository', () => {
  let store: InMemoryEntityStore;
  let repository: PlayerRepository;

  beforeEach(() => {
    store = new InMemoryEntityStore();
    repository = new PlayerRepository(store);
    seedPlayer(store, 'p-1', 'Ada', 'One');
    seedPlayer(store, 'p-2', 'Bea', '');
  });

  describe('findById', () => {
    it('should map the stored profile', async () => {
      await expect(repository.findById('p-1')).resolves.toEqual({
        id: 'p-1',
        first_name: 'Ada',
        last_name: 'One',
        name: 'Ada One',
      });
    });

    it('should trim the display name when a part is blank', async () => {
      const player = await repository.findById('p-2');
      expect(player?.name).toBe('Bea');
    });

    it('should return null for an unknown player', async () => {
      await expect(repository.findById('p-9')).resolves.toBeNull();
    });
  });

  describe('findByIds', () => {
    it('should key found players by ID and skip unknown ones', async () => {
      const players = await repository.findByIds(['p-1', 'p-9', 'p-2']);

      expect([...players.keys()].sort()).toEqual(['p-1', 'p-2']);
      expect(players.get('p-1')?.name).toBe('Ada One');
    });
  });
});
