/**
 * Prompt Interceptor: wraps the planner prompt builder
 *
 * The wrapper runs the host's builder untouched, then appends the affinity
 * sentence for the target user when the store has a record for them.
 *
 * Installation paths, most to least preferred:
 *   1. attach()           host hands us a wrapper registration point
 *   2. installWhenReady() host signals that the planner is loaded
 *   3. installWithRetry() look the planner up with bounded backoff
 * Until one of them succeeds the host's original builder keeps running.
 */

import { setTimeout as delay } from "node:timers/promises";
import type {
  InstallResult,
  InterceptionState,
  PlannerPromptResult,
  PluginLogger,
  PromptBuilder,
  TargetPersonInfo,
} from "../types.js";
import { buildAffinityPrompt } from "./affinity-prompt.js";
import type { AffinityStore } from "./affinity-store.js";
import type { ReadinessGate } from "./readiness-gate.js";
import { errorMessage } from "../utils/logger.js";

// Shared by every interceptor so a builder is never wrapped twice
const wrappers = new WeakSet<PromptBuilder>();

export function isPromptBuilder(value: unknown): value is PromptBuilder {
  return typeof value === "function";
}

export function isAffinityWrapper(value: unknown): boolean {
  return isPromptBuilder(value) && wrappers.has(value);
}

function plannerChatId(planner: unknown): string | undefined {
  if (typeof planner === "object" && planner !== null && "chatId" in planner) {
    return typeof planner.chatId === "string" ? planner.chatId : undefined;
  }
  return undefined;
}

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

type Attempt = { ok: true; result: InstallResult } | { ok: false; reason: string };

export class PromptInterceptor {
  private state: InterceptionState = "uninstalled";
  private original: PromptBuilder | null = null;
  private wrapper: PromptBuilder | null = null;

  constructor(private store: AffinityStore, private logger: PluginLogger) {}

  get status(): InterceptionState {
    return this.state;
  }

  get originalBuilder(): PromptBuilder | null {
    return this.original;
  }

  get installedWrapper(): PromptBuilder | null {
    return this.wrapper;
  }

  /** Wrap a builder; the result keeps the original's signature and `this`. */
  wrap(original: PromptBuilder): PromptBuilder {
    const inject = (prompt: string, info: TargetPersonInfo | null, planner: unknown) =>
      this.inject(prompt, info, planner);

    const wrapped: PromptBuilder = async function (
      this: unknown,
      ...args: Parameters<PromptBuilder>
    ): Promise<PlannerPromptResult> {
      const [prompt, messageIdList] = await original.apply(this, args);
      return [inject(prompt, args[0], this), messageIdList];
    };
    wrappers.add(wrapped);
    return wrapped;
  }

  /** Append the affinity sentence when a record is cached for the target user. */
  inject(prompt: string, info: TargetPersonInfo | null, planner?: unknown): string {
    if (!info) return prompt;
    const record = this.store.get(String(info.userId));
    if (!record) return prompt;

    const chatId = plannerChatId(planner);
    this.logger.info(
      `[affinity] Injected affinity prompt${chatId ? ` for ${chatId.slice(0, 5)}...` : ""} (user ${record.userId})`
    );
    return prompt + buildAffinityPrompt(record);
  }

  /** Replace target[key] with the wrapper. One-shot; never throws. */
  install(target: object, key: string): InstallResult {
    const attempt = this.attempt(target, key);
    return attempt.ok ? attempt.result : this.fail(attempt.reason);
  }

  /**
   * Hand the wrapper to a host-provided registration point. The host may call
   * the factory later; until it does the state stays "pending".
   */
  attach(register: (factory: (original: PromptBuilder) => PromptBuilder) => void): InstallResult {
    if (this.state === "installed") return "already-installed";
    this.state = "pending";
    try {
      register((original) => {
        if (this.wrapper) return this.wrapper;
        this.original = original;
        this.wrapper = this.wrap(original);
        this.state = "installed";
        this.logger.info("[affinity] Planner wrapper registered with host");
        return this.wrapper;
      });
    } catch (err) {
      return this.fail(`registration rejected: ${errorMessage(err)}`);
    }
    return this.status === "installed" ? "installed" : "pending";
  }

  async installWhenReady(
    gate: ReadinessGate<object>,
    key: string,
    timeoutMs?: number
  ): Promise<InstallResult> {
    if (this.state === "installed") return "already-installed";
    this.state = "pending";

    let target: object;
    try {
      target = await gate.wait(timeoutMs);
    } catch (err) {
      return this.fail(errorMessage(err));
    }
    return this.install(target, key);
  }

  async installWithRetry(
    resolveTarget: () => object | undefined,
    key: string,
    opts: RetryOptions = {}
  ): Promise<InstallResult> {
    if (this.state === "installed") return "already-installed";
    const attempts = opts.attempts ?? 5;
    const baseDelayMs = opts.baseDelayMs ?? 1000;
    const sleep = opts.sleep ?? delay;
    this.state = "pending";

    let lastReason = "planner not loaded";
    for (let i = 0; i < attempts; i++) {
      try {
        await sleep(baseDelayMs * 2 ** i);
        const target = resolveTarget();
        if (target) {
          const attempt = this.attempt(target, key);
          if (attempt.ok) return attempt.result;
          lastReason = attempt.reason;
        } else {
          lastReason = "planner not loaded";
        }
      } catch (err) {
        lastReason = errorMessage(err);
      }
      this.logger.debug?.(`[affinity] Planner patch attempt ${i + 1}/${attempts}: ${lastReason}`);
    }
    return this.fail(`${lastReason} after ${attempts} attempts`);
  }

  private attempt(target: object, key: string): Attempt {
    if (this.state === "installed") return { ok: true, result: "already-installed" };

    let current: unknown;
    try {
      current = Reflect.get(target, key);
    } catch (err) {
      return { ok: false, reason: `${key} could not be read: ${errorMessage(err)}` };
    }
    if (!isPromptBuilder(current)) {
      return { ok: false, reason: `${key} is not a function` };
    }
    if (wrappers.has(current)) {
      // Another interceptor owns this builder; this one stays inactive
      this.state = "uninstalled";
      this.logger.warn(`[affinity] ${key} is already wrapped by another interceptor, this one stays uninstalled`);
      return { ok: true, result: "already-installed" };
    }

    const wrapper = this.wrap(current);
    try {
      if (!Reflect.set(target, key, wrapper) || Reflect.get(target, key) !== wrapper) {
        return { ok: false, reason: `${key} is not writable` };
      }
    } catch (err) {
      return { ok: false, reason: `${key} could not be replaced: ${errorMessage(err)}` };
    }

    this.original = current;
    this.wrapper = wrapper;
    this.state = "installed";
    this.logger.info(`[affinity] Planner patched: ${key}`);
    return { ok: true, result: "installed" };
  }

  /** Give up on interception; the host keeps its original builder. */
  fail(reason: string): InstallResult {
    this.state = "failed";
    this.logger.error(`[affinity] Planner patch failed: ${reason}`);
    return "failed";
  }
}
