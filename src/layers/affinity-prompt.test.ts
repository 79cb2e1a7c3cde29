import { describe, expect, it } from "vitest";
import { buildAffinityPrompt } from "./affinity-prompt.js";

describe("buildAffinityPrompt", () => {
  it("states the score, the attitude and the reply rule", () => {
    expect(buildAffinityPrompt({ impression: -3, attitude: "一般" })).toBe(
      "\n你对当前用户的好感度是-3，态度是一般，好感度越高，选择reply的概率越大。好感度>50则有75%的概率reply。"
    );
  });
});
