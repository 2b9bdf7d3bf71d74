import type { DictEntry } from "./dictEntry";
import { DictError, NetworkError, ParseError, describeError } from "./errors";
import { buildBaseUrl, buildSearchRequest } from "./requestBuilder";
import { parseResponse } from "./responseParser";
import { FetchTransport } from "./transport";
import type { IDictTransport } from "./transport";
import { DictType, SearchMode } from "./types";
import type { DictClientConfig } from "./types";

export const DEFAULT_IMPERSONATE = "chrome136";

export type NaverDictClientOptions = Partial<DictClientConfig> & {
  transport?: IDictTransport;
};

export class NaverDictClient {
  readonly dictType: DictType;
  readonly searchMode: SearchMode;
  readonly impersonate: string;
  readonly baseUrl: string;

  private transport: IDictTransport;

  constructor(options: NaverDictClientOptions = {}) {
    this.dictType = options.dictType ?? DictType.HANJA;
    this.searchMode = options.searchMode ?? SearchMode.SIMPLE;
    this.impersonate = options.impersonate ?? DEFAULT_IMPERSONATE;
    this.baseUrl = buildBaseUrl(this.dictType);
    if (options.transport && options.timeoutMs !== undefined) {
      // A custom transport owns its own timeout.
      throw new Error("timeoutMs only applies to the built-in fetch transport; set it on the custom transport");
    }
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: options.timeoutMs });
  }

  /**
   * Looks up the first auto-complete hit for `query`.
   * Resolves to null when the dictionary has no match.
   */
  async search(query: string): Promise<DictEntry | null> {
    const request = buildSearchRequest(query, this.dictType, this.searchMode);

    let body: string;
    try {
      const response = await this.transport.get({ ...request, impersonate: this.impersonate });
      if (response.status < 200 || response.status > 299) {
        throw new NetworkError(`HTTP ${response.status}`);
      }
      body = response.body;
    } catch (err) {
      // Avoid logging the query; it may be user-entered text.
      console.warn("[naver-dict] request failed", {
        dictType: this.dictType,
        searchMode: this.searchMode,
        error: describeError(err),
      });
      if (err instanceof DictError) throw err;
      throw new NetworkError(describeError(err), { cause: err });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      throw new ParseError(describeError(err), { cause: err });
    }

    const entry = parseResponse(payload);
    if (entry && entry.dictType !== this.dictType) {
      console.warn("[naver-dict] response tagged with a different dictionary", {
        requested: this.dictType,
        returned: entry.dictType,
      });
    }
    return entry;
  }
}

export async function searchDict(
  query: string,
  dictType: DictType = DictType.HANJA,
  searchMode: SearchMode = SearchMode.SIMPLE,
  impersonate: string = DEFAULT_IMPERSONATE
): Promise<DictEntry | null> {
  const client = new NaverDictClient({ dictType, searchMode, impersonate });
  return client.search(query);
}
