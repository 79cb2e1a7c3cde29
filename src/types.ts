/**
 * Affinity Injector: Type Definitions
 * Affinity records, planner prompt signature, host plugin API
 */

// --- Affinity ---

export const DEFAULT_ATTITUDE = "一般";
export const DEFAULT_IMPRESSION = 0;

export interface AffinityScore {
  impression: number;
  attitude: string;
}

export type AffinityRecord = Readonly<AffinityScore & { userId: string }>;

export type FetchFailureReason = "timeout" | "transport" | "decode";

export type AffinityLookup =
  | ({ ok: true } & AffinityScore)
  | { ok: false; reason: FetchFailureReason; error: string };

// --- Planner prompt ---

export interface TargetPersonInfo {
  userId: string | number;
  personName?: string;
}

export interface ActionInfo {
  name: string;
  description?: string;
}

export interface DatabaseMessage {
  messageId: string;
  userId?: string;
  content: string;
  time?: number;
}

export type MessageIdEntry = [id: string, message: DatabaseMessage];

export type PlannerPromptResult = [prompt: string, messageIdList: MessageIdEntry[]];

export type PromptBuilder = (
  chatTargetInfo: TargetPersonInfo | null,
  currentAvailableActions: Record<string, ActionInfo>,
  messageIdList: MessageIdEntry[],
  chatContentBlock?: string,
  interest?: string,
  promptKey?: string
) => Promise<PlannerPromptResult>;

export type InterceptionState = "uninstalled" | "pending" | "installed" | "failed";

export type InstallResult = "installed" | "already-installed" | "pending" | "failed";

// --- Host plugin API ---

export interface PluginLogger {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface InboundMessage {
  userId: string | number;
  streamId?: string;
  text?: string;
}

export interface HookOutcome {
  success: boolean;
  continueProcessing: boolean;
}

export interface CommandInvocation {
  text: string;
  userId: string | number;
  streamId: string;
  /** Send a reply without storing it in the chat history. */
  reply(text: string): Promise<void>;
}

export interface CommandResult {
  success: boolean;
  message: string;
  interceptLevel: number;
}

export interface CommandDefinition {
  name: string;
  description: string;
  pattern: RegExp;
  execute(invocation: CommandInvocation): Promise<CommandResult>;
}

export interface PluginApi {
  logger?: PluginLogger;
  config?: unknown;
  on(
    event: "message_received",
    handler: (message: InboundMessage) => Promise<HookOutcome>,
    opts?: { name: string; description: string; weight: number }
  ): void;
  registerCommand?(command: CommandDefinition): void;
  /** Host-side registration point for planner prompt wrappers. */
  wrapPromptBuilder?(factory: (original: PromptBuilder) => PromptBuilder): void;
  /** Resolves with the object carrying the planner prompt builder once it is loaded. */
  plannerReady?: Promise<object>;
  resolvePlanner?(): object | undefined;
  isGroupChat?(streamId: string): boolean | Promise<boolean>;
}

// --- Config ---

export const DEFAULT_CACHE_TTL_SECONDS = 3600;
export const PLANNER_PROMPT_KEY = "buildPlannerPrompt";

export interface AffinityInjectorConfig {
  name: string;
  configVersion: string;
  enabled: boolean;
  userDebug: boolean;
  apiUrl: string;
  timeoutSeconds: number;
  cacheTtlSeconds: number;
}
