import { DEFAULT_IMPERSONATE } from "./naverDictClient";
import { DictType, SearchMode } from "./types";
import type { DictClientConfig, DictTypeName } from "./types";

function isDictTypeName(value: string): value is DictTypeName {
  return Object.prototype.hasOwnProperty.call(DictType, value);
}

/** Accepts a selector name ("english", "HANJA") or a wire code ("enko"). */
export function normalizeDictType(value: string | undefined | null): DictType | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const name = trimmed.toUpperCase();
  if (isDictTypeName(name)) return DictType[name];

  const code = trimmed.toLowerCase();
  return Object.values(DictType).find((known) => known === code) ?? null;
}

export function normalizeSearchMode(value: string | undefined | null): SearchMode | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  return Object.values(SearchMode).find((known) => known === normalized) ?? null;
}

function parseTimeoutMs(value: string | undefined) {
  if (!value) return undefined;
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) return undefined;
  return parsed;
}

export function loadDictConfigFromEnv(): DictClientConfig {
  const rawDictType = process.env.NAVER_DICT_TYPE;
  const dictType = normalizeDictType(rawDictType);
  if (rawDictType?.trim() && !dictType) {
    console.warn("[naver-dict] unknown NAVER_DICT_TYPE; using hanja", { value: rawDictType });
  }

  const rawSearchMode = process.env.NAVER_DICT_SEARCH_MODE;
  const searchMode = normalizeSearchMode(rawSearchMode);
  if (rawSearchMode?.trim() && !searchMode) {
    console.warn("[naver-dict] unknown NAVER_DICT_SEARCH_MODE; using simple", {
      value: rawSearchMode,
    });
  }

  return {
    dictType: dictType ?? DictType.HANJA,
    searchMode: searchMode ?? SearchMode.SIMPLE,
    impersonate: process.env.NAVER_DICT_IMPERSONATE?.trim() || DEFAULT_IMPERSONATE,
    timeoutMs: parseTimeoutMs(process.env.NAVER_DICT_TIMEOUT_MS),
  };
}
