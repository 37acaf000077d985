/**
 * Key Layout Tests
 */

import {
  candidateNameClaimKey,
  draftCapacityKey,
  draftOrderKey,
  idFromPartition,
  parseDraftOrderSortKey,
  parsePickSortKey,
  pickClaimKey,
  pickKey,
  seasonTransitionKey,
} from '../../src/repositories/keys';

describe('Key layout', () => {
  it('should zero-pad draft order positions so they sort lexically', () => {
    expect(draftOrderKey(2026, 3, 'p-1')).toEqual({ PK: 'YEAR#2026', SK: 'ORDER#03#PLAYER#p-1' });
    expect(draftOrderKey(2026, 12, 'p-2').SK).toBe('ORDER#12#PLAYER#p-2');
  });

  it('should place picks and capacity records under the player partition', () => {
    expect(pickKey('p-1', 2025, 'c-9')).toEqual({ PK: 'PLAYER#p-1', SK: 'PICK#2025#c-9' });
    expect(draftCapacityKey('p-1', 2025)).toEqual({ PK: 'PLAYER#p-1', SK: 'DRAFT_SLOTS#2025' });
  });

  it('should bucket name claims by first character', () => {
    expect(candidateNameClaimKey('betty white')).toEqual({ PK: 'NAME#b', SK: 'NAME#betty white' });
  });

  it('should key claims and transitions by year', () => {
    expect(pickClaimKey(2025, 'c-9')).toEqual({ PK: 'YEAR#2025', SK: 'CLAIM#c-9' });
    expect(seasonTransitionKey(2025, 2026)).toEqual({ PK: 'MIGRATION#2025_TO_2026', SK: 'METADATA' });
  });

  describe('parsers', () => {
    it('should parse draft order sort keys', () => {
      expect(parseDraftOrderSortKey('ORDER#07#PLAYER#p-4')).toEqual({ position: 7, playerId: 'p-4' });
      expect(parseDraftOrderSortKey('ORDER#xx#PLAYER#p-4')).toBeNull();
      expect(parseDraftOrderSortKey('CLAIM#c-1')).toBeNull();
    });

    it('should parse pick sort keys', () => {
      expect(parsePickSortKey('PICK#2025#c-9')).toEqual({ year: 2025, candidateId: 'c-9' });
      expect(parsePickSortKey('DRAFT_SLOTS#2025')).toBeNull();
    });

    it('should strip partition prefixes', () => {
      expect(idFromPartition('PLAYER#p-1', 'PLAYER#')).toBe('p-1');
      expect(idFromPartition('PERSON#c-1', 'PLAYER#')).toBeNull();
    });
  });
});
