import { DICT_LOCALES, DictType, SEARCH_MODE_CODES } from "./types";
import type { DictRequest, SearchMode } from "./types";

export const AC_HOST = "https://ac-dict.naver.com";
export const GENERIC_REFERER = "https://dict.naver.com/";

export function buildBaseUrl(dictType: DictType) {
  return `${AC_HOST}/${dictType}/ac`;
}

export function getSearchParams(query: string, searchMode: SearchMode): Record<string, string> {
  const { st, r_lt } = SEARCH_MODE_CODES[searchMode];
  return {
    st,
    r_lt,
    q: query,
    r_format: "json",
    r_enc: "UTF-8",
  };
}

function subdomainReferer(dictType: DictType) {
  return `https://${DICT_LOCALES[dictType]}.dict.naver.com/`;
}

// Only hanja, Korean and English get their own subdomain; every other
// language pair is sent with the generic dictionary home page.
export function getReferer(dictType: DictType) {
  switch (dictType) {
    case DictType.HANJA:
    case DictType.KOREAN:
    case DictType.ENGLISH:
      return subdomainReferer(dictType);
    default:
      return GENERIC_REFERER;
  }
}

export function buildSearchRequest(
  query: string,
  dictType: DictType,
  searchMode: SearchMode
): DictRequest {
  return {
    url: buildBaseUrl(dictType),
    params: getSearchParams(query, searchMode),
    headers: {
      referer: getReferer(dictType),
    },
  };
}
