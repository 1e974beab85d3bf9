import { nameVariations, variationKey } from './normalize.js';
import type { MatchDecision, MatchStrategy, NameVariation, ObituaryNameRecord } from './types.js';

const STRATEGY_LABELS: Record<MatchStrategy, string> = {
  exact: 'Exact match',
  middle_name: 'Middle name match',
  nickname: 'Nickname match',
  maiden_name: 'Maiden name match',
};

interface RecordForm {
  strategy: MatchStrategy;
  first: string | undefined;
  last: string | undefined;
}

function recordForms(record: ObituaryNameRecord): RecordForm[] {
  const forms: RecordForm[] = [{ strategy: 'exact', first: record.firstName, last: record.lastName }];

  if (record.middleName) {
    forms.push({ strategy: 'middle_name', first: record.middleName, last: record.lastName });
  }

  if (record.nickName) {
    forms.push({ strategy: 'nickname', first: record.nickName, last: record.lastName });
  }

  if (record.maidenName) {
    forms.push({ strategy: 'maiden_name', first: record.firstName, last: record.maidenName });
  }

  return forms;
}

function findShared(candidate: NameVariation[], form: RecordForm): NameVariation | undefined {
  const keys = new Set(nameVariations(form.first, form.last).map(variationKey));
  return candidate.find((variation) => keys.has(variationKey(variation)));
}

/**
 * Decide whether an obituary name plausibly refers to the candidate.
 *
 * Checks run in a fixed order (exact, middle name, nickname, maiden name) and
 * the first hit decides the strategy. Equality is on normalized tokens only.
 */
export function matchName(candidateFirst: string, candidateLast: string, record: ObituaryNameRecord): MatchDecision {
  const candidate = nameVariations(candidateFirst, candidateLast);

  if (candidate.length > 0) {
    for (const form of recordForms(record)) {
      const shared = findShared(candidate, form);
      if (shared) {
        return {
          isMatch: true,
          strategy: form.strategy,
          reason: `${STRATEGY_LABELS[form.strategy]}: ${shared.first} ${shared.last}`,
        };
      }
    }
  }

  return {
    isMatch: false,
    strategy: null,
    reason: `No match found. Candidate: ${candidateFirst} ${candidateLast}, Obituary: ${record.firstName} ${record.lastName}`,
  };
}
