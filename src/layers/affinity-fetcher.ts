/**
 * Affinity Fetcher: remote impression/attitude lookup
 * POST {baseUrl}/get_info/{userId}, one request per call, bounded by a timeout.
 * Failures are categorized for logging and collapse to the neutral score.
 */

import { z } from "zod";
import type { AffinityLookup, AffinityScore, PluginLogger } from "../types.js";
import { DEFAULT_ATTITUDE, DEFAULT_IMPRESSION } from "../types.js";
import { errorMessage } from "../utils/logger.js";

const AffinityResponseSchema = z.object({
  impression: z.number().int().optional(),
  attitude: z.string().optional(),
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const NEUTRAL_SCORE: Readonly<AffinityScore> = Object.freeze({
  impression: DEFAULT_IMPRESSION,
  attitude: DEFAULT_ATTITUDE,
});

export class AffinityFetcher {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;
  private logger: PluginLogger;

  constructor(opts: {
    baseUrl: string;
    timeoutSeconds: number;
    logger: PluginLogger;
    fetchImpl?: FetchLike;
  }) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutSeconds * 1000;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  urlFor(userId: string): string {
    return `${this.baseUrl}/get_info/${encodeURIComponent(userId)}`;
  }

  /**
   * Query the affinity service. Never rejects; failures come back as
   * `{ ok: false, reason }`.
   */
  async lookup(userId: string): Promise<AffinityLookup> {
    const url = this.urlFor(userId);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, { method: "POST", signal: controller.signal });
    } catch (err) {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        return { ok: false, reason: "timeout", error: `no response within ${this.timeoutMs}ms` };
      }
      return { ok: false, reason: "transport", error: errorMessage(err) };
    }

    try {
      if (!resp.ok) {
        return { ok: false, reason: "transport", error: `HTTP ${resp.status}` };
      }

      let body: unknown;
      try {
        body = await resp.json();
      } catch (err) {
        if (controller.signal.aborted) {
          return { ok: false, reason: "timeout", error: `body not received within ${this.timeoutMs}ms` };
        }
        return { ok: false, reason: "decode", error: errorMessage(err) };
      }

      const parsed = AffinityResponseSchema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return {
          ok: false,
          reason: "decode",
          error: `${issue?.path.join(".") || "body"}: ${issue?.message ?? "invalid response"}`,
        };
      }

      return {
        ok: true,
        impression: parsed.data.impression ?? DEFAULT_IMPRESSION,
        attitude: parsed.data.attitude ?? DEFAULT_ATTITUDE,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /** Affinity for the user, or the neutral score when the lookup fails. */
  async fetch(userId: string): Promise<AffinityScore> {
    const result = await this.lookup(userId);
    if (result.ok) {
      this.logger.debug?.(`[affinity] Lookup ok: user ${userId} impression=${result.impression}`);
      return { impression: result.impression, attitude: result.attitude };
    }

    switch (result.reason) {
      case "timeout":
        this.logger.error(`[affinity] Request timed out: ${this.urlFor(userId)} (${result.error})`);
        break;
      case "transport":
        this.logger.error(`[affinity] Request failed: ${this.urlFor(userId)} (${result.error})`);
        break;
      case "decode":
        this.logger.error(`[affinity] Bad response from ${this.urlFor(userId)}: ${result.error}`);
        break;
    }
    return { ...NEUTRAL_SCORE };
  }
}
