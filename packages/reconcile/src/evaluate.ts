import { matchName } from '@obitsweep/name-matching';
import type { ObituaryEntry } from '@obitsweep/obituary-client';
import type { Candidate, EvaluatedEntry, SearchOutcome } from './types.js';

/**
 * Run the name matcher over every returned entry, keeping the service's order.
 */
export function evaluateEntries(candidate: Candidate, entries: ObituaryEntry[]): SearchOutcome {
  const matched: EvaluatedEntry[] = [];
  const unmatched: EvaluatedEntry[] = [];

  for (const entry of entries) {
    const decision = matchName(candidate.firstName, candidate.lastName, entry.name);
    const evaluated = { ...entry, decision };

    if (decision.isMatch) {
      matched.push(evaluated);
    } else {
      unmatched.push(evaluated);
    }
  }

  return { candidate, entries, matched, unmatched };
}
