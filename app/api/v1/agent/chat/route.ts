import {
  handleApiRoute,
  handlePreflight,
  jsonResponse,
  parseJsonBody,
} from "@/backend/transport/rest/pipeline";
import { chatRequestSchema } from "@/backend/transport/rest/schemas";

export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  return handleApiRoute(request, async ({ container, requestId }) => {
    const payload = await parseJsonBody(request, chatRequestSchema);

    const result = await container.useCases.chatWithAgent.execute({
      message: payload.message,
      sessionId: payload.session_id,
      userId: payload.user_id,
    });

    return jsonResponse(requestId, {
      response: result.response,
      intent: result.intent,
      sessionId: result.sessionId,
      userId: result.userId,
      history: result.history,
    });
  });
}

export const OPTIONS = handlePreflight;
