import { withChatHistoryStore } from "@/backend/application/chat-history-store";
import { ValidationError } from "@/backend/application/errors";
import { CHAT_ROLES, isChatRole, type ChatMessage } from "@/backend/domain/chat-history";
import type { ChatHistoryRepository } from "@/backend/ports/chat-history-repository";

export interface AppendChatTurnInput {
  userId: string;
  role: string;
  content: string;
}

export class AppendChatTurnUseCase {
  constructor(private readonly chatHistory: ChatHistoryRepository) {}

  async execute(input: AppendChatTurnInput): Promise<ChatMessage> {
    if (input.userId.trim().length === 0) {
      throw new ValidationError("User id must not be empty");
    }

    const role = input.role;
    if (!isChatRole(role)) {
      throw new ValidationError(`Role must be one of: ${CHAT_ROLES.join(", ")}`);
    }

    if (input.content.trim().length === 0) {
      throw new ValidationError("Message content must not be empty");
    }

    return withChatHistoryStore(() =>
      this.chatHistory.append({
        userId: input.userId,
        role,
        content: input.content,
      }),
    );
  }
}
