import type { Candidate, EligibilityOptions, InputRow, ProgressState } from './types.js';

export const FIRST_NAME_COLUMN = 'First Name';
export const LAST_NAME_COLUMN = 'Last Name';
export const EXPIRATION_DATE_COLUMN = 'Expiration Date';
export const DEFAULT_EXPIRATION_YEAR_CUTOFF = 2023;

const MIN_NAME_LENGTH = 2;
const YEAR = /^\d{4}$/;

/**
 * Year of an `MM/DD/YYYY`, `MM-DD-YYYY` or `YYYY-MM-DD` date, or null.
 */
export function parseExpirationYear(value: string | undefined): number | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const parts = trimmed.split(/[/-]/).map((part) => part.trim());
  if (parts.length < 2) return null;

  const first = parts[0] ?? '';
  const last = parts[parts.length - 1] ?? '';
  const yearPart = YEAR.test(first) ? first : last;

  return YEAR.test(yearPart) ? Number(yearPart) : null;
}

function toCandidate(row: InputRow, sourceIndex: number, options: EligibilityOptions): Candidate | null {
  const year = parseExpirationYear(row[EXPIRATION_DATE_COLUMN]);
  if (year === null || year <= options.expirationYearCutoff) return null;

  const firstName = row[FIRST_NAME_COLUMN]?.trim() ?? '';
  const lastName = row[LAST_NAME_COLUMN]?.trim() ?? '';
  if (firstName.length < MIN_NAME_LENGTH || lastName.length < MIN_NAME_LENGTH) return null;

  return { firstName, lastName, rawRow: row, sourceIndex };
}

/**
 * Rows with a recent expiration year and usable names, tagged with their input index.
 * Other rows are dropped without comment.
 */
export function selectEligibleCandidates(
  rows: readonly InputRow[],
  options: EligibilityOptions = { expirationYearCutoff: DEFAULT_EXPIRATION_YEAR_CUTOFF },
): Candidate[] {
  const candidates: Candidate[] = [];

  rows.forEach((row, index) => {
    const candidate = toCandidate(row, index, options);
    if (candidate) candidates.push(candidate);
  });

  return candidates;
}

/**
 * Candidates still to be looked up given a loaded checkpoint.
 *
 * Rows below `lastProcessedIndex` are always skipped. Once the checkpoint has
 * counted processed rows, the row at `lastProcessedIndex` was written by the
 * batch that saved it and is skipped too.
 */
export function selectResumableCandidates(candidates: readonly Candidate[], progress: ProgressState): Candidate[] {
  if (progress.completed) return [];

  const boundaryDone = progress.totalProcessed > 0;
  return candidates.filter((candidate) =>
    boundaryDone ? candidate.sourceIndex > progress.lastProcessedIndex : candidate.sourceIndex >= progress.lastProcessedIndex,
  );
}
