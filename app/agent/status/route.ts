import { handleApiRoute, handlePreflight, jsonResponse } from "@/backend/transport/rest/pipeline";

export const runtime = "nodejs";

export async function GET(request: Request): Promise<Response> {
  return handleApiRoute(request, async ({ container, requestId }) => {
    return jsonResponse(requestId, container.useCases.getAgentStatus.execute());
  });
}

export const OPTIONS = handlePreflight;
