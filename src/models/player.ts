/**
 * Player Models
 *
 * Players sign up outside the engine; the engine only reads their profile.
 */

import { readString, StoreItem } from '../repositories/entity-store';
import { idFromPartition } from '../repositories/keys';

/**
 * Player entity
 */
export interface Player {
  id: string;
  first_name: string;
  last_name: string;
  name: string;                  // Display name, "first last"
}

/**
 * Convert a stored PLAYER#{id}/DETAILS item to a Player
 */
export function mapPlayerItem(item: StoreItem): Player | null {
  const id = idFromPartition(item.PK, 'PLAYER#');
  if (!id) {
    return null;
  }
  const firstName = readString(item, 'FirstName') ?? '';
  const lastName = readString(item, 'LastName') ?? '';
  return {
    id,
    first_name: firstName,
    last_name: lastName,
    name: `${firstName} ${lastName}`.trim(),
  };
}
