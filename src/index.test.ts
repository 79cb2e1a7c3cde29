import { describe, expect, it, vi } from "vitest";
import affinityInjector from "./index.js";
import type {
  CommandDefinition,
  HookOutcome,
  InboundMessage,
  PlannerPromptResult,
  PluginApi,
  PromptBuilder,
} from "./types.js";

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

class Planner {
  chatId = "chat-1";
  async buildPlannerPrompt(): Promise<PlannerPromptResult> {
    return ["Hello", []];
  }
}

function fakeHost(extra: Partial<PluginApi> = {}) {
  const handlers: Array<(message: InboundMessage) => Promise<HookOutcome>> = [];
  const commands: CommandDefinition[] = [];
  const api: PluginApi = {
    logger: makeLogger(),
    config: { plugin: { user_debug: true }, api: { url: "http://affinity.test" } },
    on: (_event, handler) => {
      handlers.push(handler);
    },
    registerCommand: (command) => {
      commands.push(command);
    },
    ...extra,
  };
  return { api, handlers, commands };
}

describe("affinityInjector", () => {
  it("registers the message hook and the debug command", () => {
    const planner = new Planner();
    const { api, handlers, commands } = fakeHost({ plannerReady: Promise.resolve(planner) });

    const service = affinityInjector(api);

    expect(service).not.toBeNull();
    expect(handlers).toHaveLength(1);
    expect(commands.map((c) => c.name)).toEqual(["debug"]);
  });

  it("enriches on message and injects into the planner once it is ready", async () => {
    const planner = new Planner();
    const { api, handlers } = fakeHost({ plannerReady: Promise.resolve(planner) });
    const service = affinityInjector(api);
    if (!service) throw new Error("plugin not created");

    vi.spyOn(service.fetcher, "fetch").mockResolvedValue({ impression: 80, attitude: "friendly" });
    expect(await service.installation).toBe("installed");

    await handlers[0]?.({ userId: "u1" });
    const [prompt] = await planner.buildPlannerPrompt();

    expect(prompt).toBe("Hello");
    const wrapped: PromptBuilder = planner.buildPlannerPrompt;
    const [targeted] = await wrapped.call(planner, { userId: "u1" }, {}, []);
    expect(targeted).toBe(
      "Hello\n你对当前用户的好感度是80，态度是friendly，好感度越高，选择reply的概率越大。好感度>50则有75%的概率reply。"
    );
  });

  it("prefers the host registration point when offered", async () => {
    let hostBuilder: PromptBuilder = async () => ["Hello", []];
    const wrapPromptBuilder = vi.fn((factory: (original: PromptBuilder) => PromptBuilder) => {
      hostBuilder = factory(hostBuilder);
    });
    const { api } = fakeHost({ wrapPromptBuilder, resolvePlanner: () => new Planner() });

    const service = affinityInjector(api);

    expect(await service?.installation).toBe("installed");
    expect(wrapPromptBuilder).toHaveBeenCalledTimes(1);
    expect(service?.interceptor.installedWrapper).toBe(hostBuilder);
  });

  it("resolves the installation as failed when the planner lookup keeps throwing", async () => {
    const { api } = fakeHost({
      resolvePlanner: () => {
        throw new Error("not yet");
      },
    });

    const service = affinityInjector(api, { retry: { attempts: 2, baseDelayMs: 1 } });

    expect(await service?.installation).toBe("failed");
    expect(service?.interceptor.status).toBe("failed");
    expect(api.logger?.error).toHaveBeenCalledWith("[affinity] Planner patch failed: not yet after 2 attempts");
  });

  it("fails straight away when the readiness signal rejects", async () => {
    const { api } = fakeHost({ plannerReady: Promise.reject(new Error("planner crashed")) });

    const service = affinityInjector(api);

    expect(await service?.installation).toBe("failed");
    expect(api.logger?.error).toHaveBeenCalledWith(
      "[affinity] Planner patch failed: planner readiness signal failed: planner crashed"
    );
  });

  it("skips interception but keeps the no-op hook when disabled", async () => {
    const { api, handlers } = fakeHost({
      config: { plugin: { enabled: false } },
      plannerReady: Promise.resolve(new Planner()),
    });

    const service = affinityInjector(api);

    expect(service?.installation).toBeNull();
    expect(service?.interceptor.status).toBe("uninstalled");
    expect(await handlers[0]?.({ userId: "u1" })).toEqual({ success: true, continueProcessing: true });
  });

  it("registers nothing when the config is invalid", () => {
    const { api, handlers, commands } = fakeHost({ config: { api: { url: "nope" } } });

    expect(affinityInjector(api)).toBeNull();
    expect(handlers).toHaveLength(0);
    expect(commands).toHaveLength(0);
    expect(api.logger?.error).toHaveBeenCalledWith("[affinity] Invalid config: api.url: Invalid url");
  });

  it("reports a failed installation when the host exposes no hook point", async () => {
    const { api } = fakeHost();
    const service = affinityInjector(api);
    expect(await service?.installation).toBe("failed");
  });
});
