export const CHAT_ROLES = ["user", "assistant"] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

export interface ChatMessage {
  id: number;
  userId: string;
  role: ChatRole;
  content: string;
  createdAt: string;
}

const chatRoles = new Set<string>(CHAT_ROLES);

export function isChatRole(value: string): value is ChatRole {
  return chatRoles.has(value);
}

export function compareChatMessages(left: ChatMessage, right: ChatMessage): number {
  const byTime = Date.parse(left.createdAt) - Date.parse(right.createdAt);
  if (byTime !== 0) {
    return byTime;
  }

  return left.id - right.id;
}
