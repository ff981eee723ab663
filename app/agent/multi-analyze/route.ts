import {
  handleApiRoute,
  handlePreflight,
  jsonResponse,
  parseJsonBody,
} from "@/backend/transport/rest/pipeline";
import { analyzeRequestSchema } from "@/backend/transport/rest/schemas";

export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  return handleApiRoute(request, async ({ container, requestId }) => {
    const payload = await parseJsonBody(request, analyzeRequestSchema);

    const result = await container.useCases.analyzeWithAgents.execute({
      content: payload.content,
      language: payload.language,
      userId: payload.user_id,
    });

    return jsonResponse(requestId, result);
  });
}

export const OPTIONS = handlePreflight;
