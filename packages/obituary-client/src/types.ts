import type { ObituaryNameRecord } from '@obitsweep/name-matching';

export interface ObituaryEntry {
  id: string;
  name: ObituaryNameRecord;
  obituaryUrl: string;
}

export interface SearchQuery {
  firstName: string;
  lastName: string;
}

/**
 * Fixed filters sent with every query. Dates use the service's MM-DD-YYYY format.
 */
export interface SearchWindow {
  startDate: string;
  endDate: string;
  countryIds: string[];
  regionIds: string[];
  limit: number;
}
