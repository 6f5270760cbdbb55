/**
 * JSON over HTTP with a fixed per-request timeout.
 *
 * Responses are checked against a zod schema. Every failure (timeout,
 * non-2xx status, bad JSON, schema mismatch) comes back as a `LookupError`
 * value; nothing here throws.
 */

import fetch, { FetchError, RequestInit } from "node-fetch";
import { z } from "zod";
import { DEFAULT_TIMEOUT_MS } from "../config";
import { fail, ok, Result } from "./types";

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<FetchResponse>;

export interface HttpClientOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getJson<T>(url: string, schema: JsonSchema<T>): Promise<Result<T>> {
    return this.requestJson(url, schema, { method: "GET" });
  }

  async postJson<T>(url: string, body: unknown, schema: JsonSchema<T>): Promise<Result<T>> {
    return this.requestJson(url, schema, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  private async requestJson<T>(url: string, schema: JsonSchema<T>, init: RequestInit): Promise<Result<T>> {
    let data: unknown;
    try {
      const response = await this.fetchImpl(url, { ...init, timeout: this.timeoutMs });
      if (!response.ok) {
        return fail("http", `${response.status} ${response.statusText}`);
      }
      data = await response.json();
    } catch (err) {
      return fail(...classifyError(err, this.timeoutMs));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
      return fail("payload", `unexpected response${where}: ${issue?.message ?? "invalid"}`);
    }
    return ok(parsed.data);
  }
}

function classifyError(err: unknown, timeoutMs: number): ["timeout" | "payload" | "network", string] {
  if (err instanceof FetchError) {
    if (err.type === "request-timeout" || err.type === "body-timeout") {
      return ["timeout", `timed out after ${timeoutMs}ms`];
    }
    if (err.type === "invalid-json") {
      return ["payload", err.message];
    }
  }
  if (err instanceof SyntaxError) {
    return ["payload", err.message];
  }
  return ["network", err instanceof Error ? err.message : String(err)];
}
