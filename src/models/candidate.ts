/**
 * Candidate Models
 *
 * A candidate is a person who may be drafted. Status is never stored: a
 * candidate is deceased exactly when a death date is present.
 */

import { readNumber, readString, StoreItem } from '../repositories/entity-store';
import { candidateKey, candidateNameClaimKey, idFromPartition } from '../repositories/keys';

export type CandidateStatus = 'active' | 'deceased';

/**
 * Candidate entity
 */
export interface Candidate {
  id: string;
  name: string;
  normalized_name: string;
  age: number;                   // Stored age; missing ages read as 0
  death_date?: string;           // ISO-8601 date
  birth_date?: string;
}

/**
 * Fields supplied when the Draft Engine creates a candidate
 */
export interface NewCandidate {
  name: string;
  age?: number;
  birth_date?: string;
}

export function getCandidateStatus(candidate: Candidate): CandidateStatus {
  return candidate.death_date ? 'deceased' : 'active';
}

export function isDeceased(candidate: Candidate): boolean {
  return getCandidateStatus(candidate) === 'deceased';
}

/**
 * Year of death, or null for living candidates and unparseable dates
 */
export function getDeathYear(candidate: Candidate): number | null {
  if (!candidate.death_date) {
    return null;
  }
  const year = parseInt(candidate.death_date.slice(0, 4), 10);
  return Number.isInteger(year) ? year : null;
}

/**
 * Convert a stored PERSON#{id}/DETAILS item to a Candidate
 */
export function mapCandidateItem(item: StoreItem): Candidate | null {
  const id = idFromPartition(item.PK, 'PERSON#');
  const name = readString(item, 'Name') ?? readString(item, 'name');
  if (!id || !name) {
    return null;
  }
  return {
    id,
    name,
    normalized_name: readString(item, 'NormalizedName') ?? '',
    age: readNumber(item, 'Age') ?? 0,
    death_date: readString(item, 'DeathDate'),
    birth_date: readString(item, 'BirthDate'),
  };
}

/**
 * Build the stored item for a new candidate
 */
export function buildCandidateItem(id: string, normalizedName: string, candidate: NewCandidate): StoreItem {
  return {
    ...candidateKey(id),
    Type: 'Person',
    Name: candidate.name,
    NormalizedName: normalizedName,
    Age: candidate.age,
    BirthDate: candidate.birth_date,
  };
}

/**
 * Build the name claim pointing a normalized name at its candidate
 */
export function buildNameClaimItem(id: string, normalizedName: string, name: string): StoreItem {
  return {
    ...candidateNameClaimKey(normalizedName),
    Type: 'NameClaim',
    CandidateID: id,
    Name: name,
    NormalizedName: normalizedName,
  };
}
