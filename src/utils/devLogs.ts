import type { TurnRole } from "../contracts/session";
import { truncate } from "./trace";

export function isConversationLoggingEnabled(): boolean {
  return process.env.DECK_LOG_CONVERSATION === "1";
}

export function logConversationMessage(args: { sessionId: string; role: TurnRole; content: string }): void {
  if (!isConversationLoggingEnabled()) return;
  const role = args.role.toUpperCase();
  const content = truncate(args.content, 2000).replace(/\s+/g, " ").trim();
  console.log(`[DECK_CHAT] session=${args.sessionId} role=${role} ${content}`);
}
