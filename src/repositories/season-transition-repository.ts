/**
 * Season Transition Repository
 */

import {
  buildSeasonTransitionItem,
  mapSeasonTransitionItem,
  SeasonTransitionRecord,
} from '../models/season-transition';
import { DynamoDBEntityStore } from './dynamodb-entity-store';
import { EntityStore } from './entity-store';
import { seasonTransitionKey } from './keys';

export class SeasonTransitionRepository {
  constructor(private store: EntityStore = new DynamoDBEntityStore()) {}

  async find(fromYear: number, toYear: number): Promise<SeasonTransitionRecord | null> {
    const item = await this.store.get(seasonTransitionKey(fromYear, toYear));
    return item ? mapSeasonTransitionItem(fromYear, toYear, item) : null;
  }

  /**
   * Overwrite the transition record
   */
  async save(record: SeasonTransitionRecord): Promise<void> {
    await this.store.put(buildSeasonTransitionItem(record));
  }
}
