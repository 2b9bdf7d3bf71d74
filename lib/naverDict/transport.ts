import { NetworkError, describeError } from "./errors";
import type { DictRequest } from "./types";

export type TransportRequest = DictRequest & {
  /** Browser identity to present, e.g. "chrome136". */
  impersonate: string;
};

export type TransportResponse = {
  status: number;
  body: string;
};

export interface IDictTransport {
  /**
   * Performs one GET. Rejects with NetworkError when no usable response
   * could be obtained; never parses the body.
   */
  get(request: TransportRequest): Promise<TransportResponse>;
}

type FetchTransportOptions = {
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 10000;

const DESKTOP_PLATFORM = "Windows NT 10.0; Win64; x64";

export function impersonateUserAgent(profile: string): string | undefined {
  const normalized = profile.trim().toLowerCase();

  const chrome = /^chrome(\d+)/.exec(normalized);
  if (chrome) {
    return `Mozilla/5.0 (${DESKTOP_PLATFORM}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${chrome[1]}.0.0.0 Safari/537.36`;
  }

  const edge = /^edge(\d+)/.exec(normalized);
  if (edge) {
    return `Mozilla/5.0 (${DESKTOP_PLATFORM}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${edge[1]}.0.0.0 Safari/537.36 Edg/${edge[1]}.0.0.0`;
  }

  const firefox = /^firefox(\d+)/.exec(normalized);
  if (firefox) {
    return `Mozilla/5.0 (${DESKTOP_PLATFORM}; rv:${firefox[1]}.0) Gecko/20100101 Firefox/${firefox[1]}.0`;
  }

  const safari = /^safari(\d+)(?:_(\d+))?/.exec(normalized);
  if (safari) {
    const version = `${safari[1]}.${safari[2] ?? "0"}`;
    return `Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/${version} Safari/605.1.15`;
  }

  return undefined;
}

function hasHeader(headers: Record<string, string>, name: string) {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

export class FetchTransport implements IDictTransport {
  private timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async get(request: TransportRequest): Promise<TransportResponse> {
    const url = `${request.url}?${new URLSearchParams(request.params).toString()}`;

    const headers: Record<string, string> = { ...request.headers };
    const userAgent = impersonateUserAgent(request.impersonate);
    if (userAgent && !hasHeader(headers, "user-agent")) {
      headers["User-Agent"] = userAgent;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(url, {
          method: "GET",
          headers,
          signal: controller.signal,
        });
      } catch (err) {
        const detail = controller.signal.aborted
          ? `request timed out after ${this.timeoutMs}ms`
          : describeError(err);
        throw new NetworkError(detail, { cause: err });
      }

      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw new NetworkError(`HTTP ${res.status} ${body || res.statusText}`.trim());
      }

      try {
        return { status: res.status, body: await res.text() };
      } catch (err) {
        throw new NetworkError(describeError(err), { cause: err });
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
