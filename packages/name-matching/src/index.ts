export { normalizeName, nameVariations, variationKey } from './normalize.js';
export { matchName } from './match.js';
export type { ObituaryNameRecord, NameVariation, MatchDecision, MatchStrategy } from './types.js';
