/**
 * Affinity Injector: Main Plugin Entry
 * Ties planner reply probability to per-user affinity from an external service.
 *
 * Hooks:
 *   message_received → cache lookup, fetch on miss, cache write
 *   planner prompt    → wrapped builder appends the affinity sentence
 *   /debug [chatId]   → cached affinity + group-chat status
 */

import type {
  AffinityInjectorConfig,
  InstallResult,
  PluginApi,
  PluginLogger,
} from "./types.js";
import { PLANNER_PROMPT_KEY } from "./types.js";
import { resolveConfig } from "./config.js";
import { AffinityStore } from "./layers/affinity-store.js";
import { AffinityFetcher, type FetchLike } from "./layers/affinity-fetcher.js";
import { EnrichmentStep } from "./layers/enrichment-step.js";
import { PromptInterceptor, type RetryOptions } from "./layers/prompt-interceptor.js";
import { ReadinessGate } from "./layers/readiness-gate.js";
import { DebugCommand } from "./layers/debug-command.js";
import { createLogger, errorMessage } from "./utils/logger.js";

export const PLANNER_READY_TIMEOUT_MS = 60_000;

export interface AffinityService {
  config: AffinityInjectorConfig;
  store: AffinityStore;
  fetcher: AffinityFetcher;
  enrichment: EnrichmentStep;
  interceptor: PromptInterceptor;
  debugCommand: DebugCommand;
  /** Settles once prompt interception is installed or given up on; null while disabled. */
  installation: Promise<InstallResult> | null;
}

/** Build the single service bundle every hook shares. */
export function createAffinityService(
  config: AffinityInjectorConfig,
  logger: PluginLogger,
  opts: {
    fetchImpl?: FetchLike;
    now?: () => number;
    isGroupChat?: (streamId: string) => boolean | Promise<boolean>;
  } = {}
): AffinityService {
  const store = new AffinityStore({ ttlSeconds: config.cacheTtlSeconds, now: opts.now });
  const fetcher = new AffinityFetcher({
    baseUrl: config.apiUrl,
    timeoutSeconds: config.timeoutSeconds,
    logger,
    fetchImpl: opts.fetchImpl,
  });

  return {
    config,
    store,
    fetcher,
    enrichment: new EnrichmentStep(store, fetcher, { enabled: config.enabled, logger }),
    interceptor: new PromptInterceptor(store, logger),
    debugCommand: new DebugCommand(store, {
      enabled: config.enabled,
      userDebug: config.userDebug,
      isGroupChat: opts.isGroupChat ?? (() => false),
    }),
    installation: null,
  };
}

async function startInterception(
  api: PluginApi,
  interceptor: PromptInterceptor,
  logger: PluginLogger,
  retry: RetryOptions
): Promise<InstallResult> {
  const wrapPromptBuilder = api.wrapPromptBuilder?.bind(api);
  if (wrapPromptBuilder) {
    return interceptor.attach(wrapPromptBuilder);
  }

  if (api.plannerReady) {
    const gate = new ReadinessGate<object>();
    void api.plannerReady.then(
      (planner) => gate.open(planner),
      (err) => gate.cancel(`planner readiness signal failed: ${errorMessage(err)}`)
    );
    return interceptor.installWhenReady(gate, PLANNER_PROMPT_KEY, PLANNER_READY_TIMEOUT_MS);
  }

  const resolvePlanner = api.resolvePlanner?.bind(api);
  if (resolvePlanner) {
    return interceptor.installWithRetry(resolvePlanner, PLANNER_PROMPT_KEY, retry);
  }

  logger.error("[affinity] Host exposes no planner hook point, prompt injection inactive");
  return "failed";
}

export default function affinityInjector(
  api: PluginApi,
  opts: { retry?: RetryOptions } = {}
): AffinityService | null {
  const logger = api.logger ?? createLogger("affinity-injector");

  const resolved = resolveConfig(api.config);
  if (!resolved.ok) {
    logger.error(`[affinity] Invalid config: ${resolved.issues.join("; ")}`);
    return null;
  }
  const { config } = resolved;
  logger.info(`[affinity] Plugin ${config.name} loaded (config ${config.configVersion})`);

  const service = createAffinityService(config, logger, {
    isGroupChat: api.isGroupChat?.bind(api),
  });

  api.on("message_received", (message) => service.enrichment.run(message), {
    name: EnrichmentStep.handlerName,
    description: EnrichmentStep.description,
    weight: EnrichmentStep.weight,
  });
  api.registerCommand?.(service.debugCommand);

  if (!config.enabled) {
    logger.info("[affinity] Disabled by config");
    return service;
  }

  service.installation = startInterception(api, service.interceptor, logger, opts.retry ?? {}).catch((err: unknown) =>
    service.interceptor.fail(`unexpected installation error: ${errorMessage(err)}`)
  );
  return service;
}

export { resolveConfig } from "./config.js";
export { AffinityStore } from "./layers/affinity-store.js";
export { AffinityFetcher, NEUTRAL_SCORE } from "./layers/affinity-fetcher.js";
export { EnrichmentStep } from "./layers/enrichment-step.js";
export { PromptInterceptor } from "./layers/prompt-interceptor.js";
export { ReadinessGate } from "./layers/readiness-gate.js";
export { DebugCommand, parseDebugCommand } from "./layers/debug-command.js";
export { buildAffinityPrompt } from "./layers/affinity-prompt.js";
export { DEFAULT_ATTITUDE, DEFAULT_CACHE_TTL_SECONDS, PLANNER_PROMPT_KEY } from "./types.js";
export type * from "./types.js";
