/**
 * Enrichment Step: message_received hook
 * Cache hit → done. Miss → fetch → store. Always reports success so the
 * host pipeline is never held up by the affinity service.
 */

import type { AffinityScore, HookOutcome, InboundMessage, PluginLogger } from "../types.js";
import type { AffinityStore } from "./affinity-store.js";
import { errorMessage } from "../utils/logger.js";

export interface ScoreSource {
  fetch(userId: string): Promise<AffinityScore>;
}

const PASS: HookOutcome = { success: true, continueProcessing: true };

export class EnrichmentStep {
  static readonly handlerName = "affinity_fetch";
  static readonly description = "Fetch user affinity before planning";
  static readonly weight = 900;

  private inFlight = new Map<string, Promise<void>>();

  constructor(
    private store: AffinityStore,
    private source: ScoreSource,
    private opts: { enabled: boolean; logger: PluginLogger }
  ) {}

  async run(message: InboundMessage): Promise<HookOutcome> {
    if (!this.opts.enabled) return PASS;

    const userId = String(message.userId);
    if (this.store.get(userId)) return PASS;

    // Second message from the same user while the first lookup is pending
    const pending = this.inFlight.get(userId);
    if (pending) {
      await pending;
      return PASS;
    }

    const task = this.refresh(userId).finally(() => this.inFlight.delete(userId));
    this.inFlight.set(userId, task);
    await task;
    return PASS;
  }

  private async refresh(userId: string): Promise<void> {
    try {
      const { impression, attitude } = await this.source.fetch(userId);
      this.store.set(userId, impression, attitude);
    } catch (err) {
      this.opts.logger.warn(`[affinity] Enrichment error for ${userId}: ${errorMessage(err)}`);
    }
  }
}
