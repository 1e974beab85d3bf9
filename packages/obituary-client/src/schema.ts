import { z } from 'zod';
import type { ObituaryEntry } from './types.js';

const optionalName = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const requiredName = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

export const obituaryNameSchema = z.object({
  firstName: requiredName,
  lastName: requiredName,
  middleName: optionalName,
  nickName: optionalName,
  maidenName: optionalName,
});

export const searchResultItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  name: obituaryNameSchema.nullish(),
  links: z
    .object({
      obituaryUrl: z.object({ href: z.string().nullish() }).nullish(),
    })
    .nullish(),
});

export const searchResponseSchema = z.object({
  totalRecordCount: z.number().int().nonnegative().catch(0),
  searchResults: z.array(z.unknown()).nullish(),
});

export interface ParsedSearchResponse {
  totalRecordCount: number;
  entries: ObituaryEntry[];
  droppedCount: number;
}

/**
 * Validate a search payload. Items that do not fit the schema are dropped one
 * by one; a payload without the envelope shape is rejected.
 */
export function parseSearchResponse(payload: unknown): ParsedSearchResponse {
  const envelope = searchResponseSchema.parse(payload);
  const items = envelope.searchResults ?? [];
  const entries: ObituaryEntry[] = [];

  for (const item of items) {
    const result = searchResultItemSchema.safeParse(item);
    if (!result.success) continue;

    const { id, name, links } = result.data;
    entries.push({
      id,
      name: {
        firstName: name?.firstName ?? '',
        lastName: name?.lastName ?? '',
        middleName: name?.middleName,
        nickName: name?.nickName,
        maidenName: name?.maidenName,
      },
      obituaryUrl: links?.obituaryUrl?.href ?? '',
    });
  }

  return {
    totalRecordCount: envelope.totalRecordCount,
    entries,
    droppedCount: items.length - entries.length,
  };
}
