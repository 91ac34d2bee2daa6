/**
 * Faucet API client over fetch.
 *
 * Every response body is checked against its TypeBox schema; a non-2xx
 * reply becomes a FaucetApiError carrying the server's error body.
 */

import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import {
  ChallengeResponseV1,
  DispatchResponseV1,
  ErrorResponseV1,
  InfoResponseV1,
  QuotaResponseV1,
  StatusResponseV1,
  type DispatchRequestV1,
} from "@starkdrip/protocol";

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class FaucetApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: ErrorResponseV1,
  ) {
    super(body.message);
    this.name = "FaucetApiError";
  }
}

export class FaucetApiClient {
  constructor(
    readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
  ) {}

  /** POST /challenge */
  async getChallenge(): Promise<ChallengeResponseV1> {
    return this.call(ChallengeResponseV1, "POST", "/challenge");
  }

  /** POST /request */
  async requestTokens(body: DispatchRequestV1): Promise<DispatchResponseV1> {
    return this.call(DispatchResponseV1, "POST", "/request", body);
  }

  /** GET /info */
  async getInfo(): Promise<InfoResponseV1> {
    return this.call(InfoResponseV1, "GET", "/info");
  }

  /** GET /quota */
  async getQuota(): Promise<QuotaResponseV1> {
    return this.call(QuotaResponseV1, "GET", "/quota");
  }

  /** GET /status/:address */
  async getStatus(address: string): Promise<StatusResponseV1> {
    return this.call(StatusResponseV1, "GET", `/status/${encodeURIComponent(address)}`);
  }

  private async call<T extends TSchema>(
    schema: T,
    method: "GET" | "POST",
    path: string,
    body?: unknown,
  ): Promise<Static<T>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? undefined : { "content-type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Cannot reach faucet at ${this.baseUrl}: ${reason}`);
    } finally {
      clearTimeout(timeout);
    }

    const text = await res.text();
    let data: unknown = null;
    if (text.length > 0) {
      try {
        data = JSON.parse(text);
      } catch {
        throw new Error(`${method} ${path} → ${res.status}: non-JSON response`);
      }
    }

    if (!res.ok) {
      if (Value.Check(ErrorResponseV1, data)) {
        throw new FaucetApiError(res.status, data);
      }
      throw new FaucetApiError(res.status, {
        error: "http_error",
        message: `${method} ${path} → ${res.status}: ${text}`,
      });
    }

    if (!Value.Check(schema, data)) {
      throw new Error(`${method} ${path}: unexpected response shape`);
    }
    return data;
  }
}
