import { flattenQuery, type QueryParams } from "../core/queryParams.js";
import { TrackingSerializationError, TrackingTransportError } from "./errors.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface DispatcherOptions {
  fetch?: FetchLike;
  /** Per-request deadline. Unset means the fetch implementation's own behavior. */
  timeoutMs?: number;
}

/**
 * Sends GET and POST requests and hands back raw response bytes.
 *
 * Only HTTP 200 yields a body. Any other status resolves `null` without an
 * error, so callers cannot tell "not found" from a server failure.
 */
export class RequestDispatcher {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number | null;

  constructor(opts: DispatcherOptions = {}) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = opts.timeoutMs ?? null;
  }

  async get(url: string, params: QueryParams = {}): Promise<Uint8Array | null> {
    const target = new URL(url);
    flattenQuery(params).forEach((value, key) => target.searchParams.append(key, value));
    return this.execute(target.toString(), { method: "GET" });
  }

  async post(url: string, request: unknown): Promise<Uint8Array | null> {
    let body: string | undefined;
    try {
      body = JSON.stringify(request);
    } catch (e) {
      throw new TrackingSerializationError(
        `unable to encode request body for ${url}: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e }
      );
    }
    if (body === undefined) {
      throw new TrackingSerializationError(`request body for ${url} is not JSON-serializable`);
    }

    return this.execute(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body
    });
  }

  private async execute(url: string, init: RequestInit): Promise<Uint8Array | null> {
    const signal = this.timeoutMs !== null ? AbortSignal.timeout(this.timeoutMs) : undefined;

    let bytes: Uint8Array;
    let status: number;
    try {
      const res = await this.fetchImpl(url, signal ? { ...init, signal } : init);
      status = res.status;
      bytes = new Uint8Array(await res.arrayBuffer());
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new TrackingTransportError(`${init.method ?? "GET"} ${url} failed: ${reason}`, { cause: e });
    }

    return status === 200 ? bytes : null;
  }
}
