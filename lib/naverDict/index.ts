export { NaverDictClient, searchDict, DEFAULT_IMPERSONATE } from "./naverDictClient";
export type { NaverDictClientOptions } from "./naverDictClient";
export { DictEntry } from "./dictEntry";
export type { DictEntryRecord } from "./dictEntry";
export { DictError, NetworkError, ParseError, InvalidResponseError } from "./errors";
export {
  buildSearchRequest,
  buildBaseUrl,
  getReferer,
  getSearchParams,
  GENERIC_REFERER,
} from "./requestBuilder";
export { parseResponse, decodeItem, ITEM_FIELD } from "./responseParser";
export type { RawItem } from "./responseParser";
export { safeGetNested } from "./safeGetNested";
export { FetchTransport, impersonateUserAgent } from "./transport";
export type { IDictTransport, TransportRequest, TransportResponse } from "./transport";
export { DictType, SearchMode, DICT_LOCALES, SEARCH_MODE_CODES } from "./types";
export type { DictTypeName, DictRequest, DictClientConfig, SearchModeCodes } from "./types";
export { loadDictConfigFromEnv, normalizeDictType, normalizeSearchMode } from "./config";
