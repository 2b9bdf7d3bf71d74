export const DictType = {
  HANJA: "ccko",
  KOREAN: "koko",
  ENGLISH: "enko",
  JAPANESE: "jako",
  CHINESE: "zhko",
  GERMAN: "deko",
  FRENCH: "frko",
  SPANISH: "esko",
  RUSSIAN: "ruko",
  VIETNAMESE: "viko",
  ITALIAN: "itko",
  THAI: "thko",
  INDONESIAN: "idko",
  UZBEK: "uzko",
} as const;

export type DictTypeName = keyof typeof DictType;

// Wire code; doubles as the path segment and the expected tag in responses.
export type DictType = (typeof DictType)[DictTypeName];

// Display locale of each dictionary, used for the referer subdomain.
export const DICT_LOCALES: Record<DictType, string> = {
  ccko: "hanja",
  koko: "ko",
  enko: "en",
  jako: "ja",
  zhko: "zh",
  deko: "de",
  frko: "fr",
  esko: "es",
  ruko: "ru",
  viko: "vi",
  itko: "it",
  thko: "th",
  idko: "id",
  uzko: "uz",
};

export const SearchMode = {
  SIMPLE: "simple",
  DETAILED: "detailed",
} as const;

export type SearchMode = (typeof SearchMode)[keyof typeof SearchMode];

export type SearchModeCodes = {
  st: string;
  r_lt: string;
};

export const SEARCH_MODE_CODES: Record<SearchMode, SearchModeCodes> = {
  simple: { st: "11", r_lt: "10" },
  detailed: { st: "111", r_lt: "111" },
};

export type DictRequest = {
  url: string;
  params: Record<string, string>;
  headers: Record<string, string>;
};

export type DictClientConfig = {
  dictType: DictType;
  searchMode: SearchMode;
  impersonate: string;
  timeoutMs?: number;
};
