/**
 * Plugin config: mirrors the [plugin] and [api] sections of the host's config file
 */

import { z } from "zod";
import type { AffinityInjectorConfig } from "./types.js";
import { DEFAULT_CACHE_TTL_SECONDS } from "./types.js";

const PluginSectionSchema = z.object({
  name: z.string().min(1).default("affinity_injector"),
  config_version: z.string().default("1.0.2"),
  enabled: z.boolean().default(true),
  user_debug: z.boolean().default(false),
});

const ApiSectionSchema = z.object({
  url: z.string().url().optional(),
  timeout: z.number().positive().optional(),
});

export const RawConfigSchema = z.object({
  plugin: PluginSectionSchema.default({}),
  api: ApiSectionSchema.default({}),
});

export const DEFAULT_API_URL = "http://127.0.0.1:8080";
export const DEFAULT_TIMEOUT_SECONDS = 10;

const EnvSchema = z.object({
  AFFINITY_API_URL: z.string().url().optional(),
  AFFINITY_API_TIMEOUT: z.coerce.number().positive().optional(),
});

export type ConfigResult =
  | { ok: true; config: AffinityInjectorConfig }
  | { ok: false; issues: string[] };

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((i) => `${prefix}${i.path.join(".") || "(root)"}: ${i.message}`);
}

/**
 * Resolve the plugin config. Values from the config file win, then the
 * AFFINITY_API_* environment variables, then defaults.
 */
export function resolveConfig(
  raw: unknown,
  env: Record<string, string | undefined> = process.env
): ConfigResult {
  const parsed = RawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error, "") };

  const envParsed = EnvSchema.safeParse({
    AFFINITY_API_URL: env.AFFINITY_API_URL || undefined,
    AFFINITY_API_TIMEOUT: env.AFFINITY_API_TIMEOUT || undefined,
  });
  if (!envParsed.success) return { ok: false, issues: formatIssues(envParsed.error, "env.") };

  const { plugin, api } = parsed.data;
  return {
    ok: true,
    config: {
      name: plugin.name,
      configVersion: plugin.config_version,
      enabled: plugin.enabled,
      userDebug: plugin.user_debug,
      apiUrl: api.url ?? envParsed.data.AFFINITY_API_URL ?? DEFAULT_API_URL,
      timeoutSeconds: api.timeout ?? envParsed.data.AFFINITY_API_TIMEOUT ?? DEFAULT_TIMEOUT_SECONDS,
      cacheTtlSeconds: DEFAULT_CACHE_TTL_SECONDS,
    },
  };
}
