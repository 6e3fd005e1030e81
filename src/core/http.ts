/**
 * HTTP client
 * Thin fetch wrapper with per-call timeouts and typed failures
 */

import { AuthRequiredError, NetworkError, SourceError } from "./errors.js";

export interface HttpResponse {
  url: string;
  status: number;
  contentType: string;
  body: Buffer;
  text(): string;
}

export interface HttpGetOptions {
  /** Which source is calling, for error reporting */
  source: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
}

/**
 * HTTP capability consumed by the fetchers.
 * Non-2xx responses reject with SourceError (AuthRequiredError for 401).
 */
export interface HttpClient {
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}

export function withQuery(url: string, query?: Record<string, string | number>): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * Global-fetch implementation
 */
export class FetchHttpClient implements HttpClient {
  private readonly userAgent: string;
  private readonly defaultTimeoutMs: number;

  constructor(options: { userAgent: string; timeoutMs: number }) {
    this.userAgent = options.userAgent;
    this.defaultTimeoutMs = options.timeoutMs;
  }

  async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
    const target = withQuery(url, options.query);
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    let response: Response;
    try {
      response = await fetch(target, {
        headers: { "User-Agent": this.userAgent, ...options.headers },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const reason = err.name === "TimeoutError" ? `timeout after ${timeoutMs}ms` : err.message;
      throw new NetworkError(`GET ${target} failed: ${reason}`, err);
    }

    if (response.status === 401) {
      throw new AuthRequiredError(options.source, target);
    }
    if (!response.ok) {
      throw new SourceError(`GET ${target} -> ${response.status}`, options.source, {
        statusCode: response.status,
        url: target,
      });
    }

    const body = Buffer.from(await response.arrayBuffer());
    return {
      url: response.url || target,
      status: response.status,
      contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
      body,
      text: () => body.toString("utf-8"),
    };
  }
}
