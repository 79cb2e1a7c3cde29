/**
 * /debug [chatId]: shows the cached affinity of the caller and whether the
 * chat is a group chat. Off unless both `enabled` and `userDebug` are set.
 */

import type {
  AffinityRecord,
  CommandDefinition,
  CommandInvocation,
  CommandResult,
} from "../types.js";
import type { AffinityStore } from "./affinity-store.js";

export const DEBUG_COMMAND_PATTERN = /^\/debug(?: (?<chatId>\w+))?$/;
const INTERCEPT_LEVEL = 2;

export function parseDebugCommand(text: string): { chatId?: string } | null {
  const match = DEBUG_COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;
  return { chatId: match.groups?.chatId };
}

export function formatRecord(record: AffinityRecord | undefined): string {
  return record ? `${record.impression}/${record.attitude}` : "none";
}

export interface DebugCommandOptions {
  enabled: boolean;
  userDebug: boolean;
  isGroupChat: (streamId: string) => boolean | Promise<boolean>;
}

export class DebugCommand implements CommandDefinition {
  readonly name = "debug";
  readonly description = "Show cached affinity for debugging";
  readonly pattern = DEBUG_COMMAND_PATTERN;

  constructor(private store: AffinityStore, private opts: DebugCommandOptions) {}

  async execute(invocation: CommandInvocation): Promise<CommandResult> {
    if (!this.opts.enabled || !this.opts.userDebug) {
      return { success: false, message: "该功能已关闭", interceptLevel: INTERCEPT_LEVEL };
    }

    const streamId = parseDebugCommand(invocation.text)?.chatId || invocation.streamId;
    const isGroupChat = await this.opts.isGroupChat(streamId);

    if (!isGroupChat) {
      const record = this.store.get(String(invocation.userId));
      await invocation.reply(`impression:${formatRecord(record)}`);
    }
    await invocation.reply(`is_group_chat:${isGroupChat}`);

    return { success: true, message: `你输入的ID是：${streamId}`, interceptLevel: INTERCEPT_LEVEL };
  }
}
