import { RunnableConfig } from "@langchain/core/runnables";

export const DEFAULT_CHAT_MODEL = "deepseek/deepseek-chat";

export function ensureBaseConfiguration(config: RunnableConfig) {
  const raw: Record<string, unknown> = config?.configurable ?? {};
  const chatModel =
    typeof raw.chatModel === "string" && raw.chatModel.trim().length > 0
      ? raw.chatModel.trim()
      : process.env.CHAT_MODEL?.trim() || DEFAULT_CHAT_MODEL;

  return { chatModel };
}
