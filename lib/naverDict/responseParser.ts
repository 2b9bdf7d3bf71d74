import { DictEntry } from "./dictEntry";
import { InvalidResponseError } from "./errors";
import { safeGetNested } from "./safeGetNested";

/**
 * Positions inside one auto-complete item. The wire format has no field
 * names; this table is the only place that knows the layout.
 *
 * `alt` carries the hanja reading for some dictionaries and translations for
 * others. It is decoded but never read into an entry.
 */
export const ITEM_FIELD = {
  word: 0,
  reading: 1,
  alt: 2,
  meanings: 3,
  entryId: 4,
  dictType: 5,
} as const;

const ITEM_FIELD_COUNT = 6;

export type RawItem = [
  words: unknown[],
  readings: unknown[],
  alt: unknown[],
  meanings: unknown[],
  entryIds: unknown[],
  dictTypes: unknown[],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function invalidItem(detail: string) {
  return new InvalidResponseError(`Invalid item structure: ${detail}`);
}

export function decodeItem(value: unknown): RawItem {
  if (!Array.isArray(value)) {
    throw invalidItem(`expected an array of ${ITEM_FIELD_COUNT} fields, got ${typeof value}`);
  }
  if (value.length < ITEM_FIELD_COUNT) {
    throw invalidItem(`expected ${ITEM_FIELD_COUNT} fields, got ${value.length}`);
  }

  const [words, readings, alt, meanings, entryIds, dictTypes]: unknown[] = value;
  if (
    !Array.isArray(words) ||
    !Array.isArray(readings) ||
    !Array.isArray(alt) ||
    !Array.isArray(meanings) ||
    !Array.isArray(entryIds) ||
    !Array.isArray(dictTypes)
  ) {
    const bad = value.slice(0, ITEM_FIELD_COUNT).findIndex((field) => !Array.isArray(field));
    throw invalidItem(`field ${bad} is not an array`);
  }

  return [words, readings, alt, meanings, entryIds, dictTypes];
}

/**
 * Turns a decoded auto-complete payload into the first matching entry.
 * Returns null when the service found nothing.
 */
export function parseResponse(raw: unknown): DictEntry | null {
  if (!isRecord(raw) || !Array.isArray(raw.items)) {
    throw new InvalidResponseError("Invalid response: missing 'items' field");
  }

  const items: unknown[] = raw.items;
  if (items.length === 0) return null;

  const group: unknown = items[0];
  if (group === null || group === undefined) return null;
  if (!Array.isArray(group)) {
    throw invalidItem("item group is not an array");
  }
  if (group.length === 0) return null;

  const item = decodeItem(group[0]);
  const meanings = item[ITEM_FIELD.meanings];

  return new DictEntry({
    word: safeGetNested(item, ITEM_FIELD.word, 0),
    reading: safeGetNested(item, ITEM_FIELD.reading, 0),
    meanings: isStringList(meanings) ? meanings : [],
    entryId: safeGetNested(item, ITEM_FIELD.entryId, 0),
    dictType: safeGetNested(item, ITEM_FIELD.dictType, 0),
  });
}
