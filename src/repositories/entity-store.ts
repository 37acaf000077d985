/**
 * Entity Store Contract
 *
 * Ordered key-value store addressed by a composite (PK, SK) key. Repositories
 * are the only callers; services never touch the store directly.
 */

/**
 * Composite item key
 */
export type StoreKey = {
  PK: string;
  SK: string;
};

/**
 * Stored item: key plus arbitrary attributes
 */
export type StoreItem = StoreKey & Record<string, unknown>;

/**
 * Predicate a conditional write must satisfy against the existing item.
 * A `versionEquals` of 0 means the item must not exist yet or must carry no
 * Version attribute (records written before versioning).
 */
export type WriteCondition =
  | { type: 'notExists' }
  | { type: 'versionEquals'; version: number };

/**
 * One operation inside an atomic multi-item write
 */
export type TransactionWrite =
  | { type: 'put'; item: StoreItem; condition?: WriteCondition }
  | { type: 'delete'; key: StoreKey };

/**
 * Outcome of an atomic multi-item write. When not committed, `failedIndexes`
 * lists the writes whose condition did not hold; nothing was applied.
 */
export interface TransactionResult {
  committed: boolean;
  failedIndexes: number[];
}

export interface EntityStore {
  get(key: StoreKey): Promise<StoreItem | null>;
  put(item: StoreItem): Promise<void>;
  putIfAbsent(item: StoreItem): Promise<boolean>;
  putConditional(item: StoreItem, condition: WriteCondition): Promise<boolean>;
  queryByPrefix(partition: string, sortPrefix: string): Promise<StoreItem[]>;
  batchGet(keys: StoreKey[]): Promise<StoreItem[]>;
  delete(key: StoreKey): Promise<void>;
  transactWrite(writes: TransactionWrite[]): Promise<TransactionResult>;
}

/**
 * Narrow a raw attribute map returned by a driver into a StoreItem
 */
export function toStoreItem(raw: Record<string, unknown>): StoreItem | null {
  const { PK, SK } = raw;
  if (typeof PK !== 'string' || typeof SK !== 'string') {
    return null;
  }
  return { ...raw, PK, SK };
}

/**
 * Read a string attribute
 */
export function readString(item: Record<string, unknown>, attribute: string): string | undefined {
  const value = item[attribute];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a numeric attribute, accepting numeric strings from older imports
 */
export function readNumber(item: Record<string, unknown>, attribute: string): number | undefined {
  const value = item[attribute];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
