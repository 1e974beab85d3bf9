/**
 * Name fields of one obituary notice as returned by the search service.
 * Optional parts are absent (not empty strings) when the notice omits them.
 */
export interface ObituaryNameRecord {
  firstName: string;
  lastName: string;
  middleName?: string;
  nickName?: string;
  maidenName?: string;
}

/**
 * Normalized (first, last) pair used only for equality checks.
 */
export interface NameVariation {
  first: string;
  last: string;
}

export type MatchStrategy = 'exact' | 'middle_name' | 'nickname' | 'maiden_name';

export type MatchDecision =
  | { isMatch: true; strategy: MatchStrategy; reason: string }
  | { isMatch: false; strategy: null; reason: string };
