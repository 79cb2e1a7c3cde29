import { describe, expect, it, vi } from "vitest";
import type { AffinityScore } from "../types.js";
import { AffinityStore } from "./affinity-store.js";
import { EnrichmentStep, type ScoreSource } from "./enrichment-step.js";

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function sourceReturning(score: AffinityScore) {
  const fetch = vi.fn(async (_userId: string) => score);
  const source: ScoreSource = { fetch };
  return { source, fetch };
}

describe("EnrichmentStep", () => {
  it("fetches on a miss and stores the score", async () => {
    const store = new AffinityStore();
    const { source, fetch } = sourceReturning({ impression: 70, attitude: "warm" });
    const step = new EnrichmentStep(store, source, { enabled: true, logger: makeLogger() });

    const outcome = await step.run({ userId: 12345 });

    expect(outcome).toEqual({ success: true, continueProcessing: true });
    expect(fetch).toHaveBeenCalledWith("12345");
    expect(store.get("12345")).toEqual({ userId: "12345", impression: 70, attitude: "warm" });
  });

  it("skips the network on a cache hit", async () => {
    const store = new AffinityStore();
    store.set("u1", 1, "x");
    const { source, fetch } = sourceReturning({ impression: 99, attitude: "y" });
    const step = new EnrichmentStep(store, source, { enabled: true, logger: makeLogger() });

    await step.run({ userId: "u1" });

    expect(fetch).not.toHaveBeenCalled();
    expect(store.get("u1")?.impression).toBe(1);
  });

  it("makes one fetch for two back-to-back messages from a new user", async () => {
    const store = new AffinityStore();
    let release: (score: AffinityScore) => void = () => undefined;
    const fetch = vi.fn(
      (_userId: string) => new Promise<AffinityScore>((resolve) => (release = resolve))
    );
    const step = new EnrichmentStep(store, { fetch }, { enabled: true, logger: makeLogger() });

    const first = step.run({ userId: "u2" });
    const second = step.run({ userId: "u2" });
    release({ impression: 40, attitude: "calm" });
    await Promise.all([first, second]);
    await step.run({ userId: "u2" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(store.get("u2")?.attitude).toBe("calm");
  });

  it("does nothing and still succeeds when disabled", async () => {
    const store = new AffinityStore();
    const { source, fetch } = sourceReturning({ impression: 5, attitude: "z" });
    const step = new EnrichmentStep(store, source, { enabled: false, logger: makeLogger() });

    expect(await step.run({ userId: "u3" })).toEqual({ success: true, continueProcessing: true });
    expect(fetch).not.toHaveBeenCalled();
    expect(store.get("u3")).toBeUndefined();
  });

  it("reports success even if the score source throws", async () => {
    const store = new AffinityStore();
    const logger = makeLogger();
    const fetch = vi.fn(async (_userId: string): Promise<AffinityScore> => {
      throw new Error("unexpected");
    });
    const step = new EnrichmentStep(store, { fetch }, { enabled: true, logger });

    expect(await step.run({ userId: "u4" })).toEqual({ success: true, continueProcessing: true });
    expect(store.get("u4")).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("[affinity] Enrichment error for u4: unexpected");
  });
});
