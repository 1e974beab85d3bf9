import type { EvaluatedEntry, OutputRow, PartitionResult, SearchOutcome } from './types.js';

export const KEPT_EXTRA_COLUMNS = ['matched_obituaries', 'total_matches', 'total_obituaries_found'] as const;
export const REMOVED_EXTRA_COLUMNS = ['removal_reason', 'matched_obituaries', 'total_obituaries_found'] as const;

function serializeEntries(entries: EvaluatedEntry[]): string {
  return JSON.stringify(
    entries.map((entry) => ({
      id: entry.id,
      name: entry.name,
      obituaryUrl: entry.obituaryUrl,
      match_reason: entry.decision.reason,
      is_match: entry.decision.isMatch,
    })),
  );
}

/**
 * Keep a candidate when at least one obituary name matches; otherwise remove
 * it, carrying the unmatched entries along for review.
 */
export function partitionOutcome(outcome: SearchOutcome): PartitionResult {
  const { candidate, entries, matched, unmatched } = outcome;
  const totalFound = String(entries.length);

  if (matched.length > 0) {
    const row: OutputRow = {
      ...candidate.rawRow,
      matched_obituaries: serializeEntries(matched),
      total_matches: String(matched.length),
      total_obituaries_found: totalFound,
    };
    return { kept: true, row };
  }

  const reason = entries.length === 0 ? 'no results' : 'no matching name';
  const row: OutputRow = {
    ...candidate.rawRow,
    removal_reason: reason,
    matched_obituaries: serializeEntries(unmatched),
    total_obituaries_found: totalFound,
  };

  return { kept: false, reason, row };
}
