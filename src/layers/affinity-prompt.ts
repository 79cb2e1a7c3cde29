import type { AffinityRecord } from "../types.js";

/** Impression above which the planner leans towards replying. */
export const REPLY_IMPRESSION_THRESHOLD = 50;
export const REPLY_PROBABILITY_PERCENT = 75;

export function buildAffinityPrompt(record: Pick<AffinityRecord, "impression" | "attitude">): string {
  return (
    `\n你对当前用户的好感度是${record.impression}，态度是${record.attitude}，` +
    `好感度越高，选择reply的概率越大。` +
    `好感度>${REPLY_IMPRESSION_THRESHOLD}则有${REPLY_PROBABILITY_PERCENT}%的概率reply。`
  );
}
