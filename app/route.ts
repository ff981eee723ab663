import { handleApiRoute, handlePreflight, jsonResponse } from "@/backend/transport/rest/pipeline";

export const runtime = "nodejs";

export async function GET(request: Request): Promise<Response> {
  return handleApiRoute(request, async ({ requestId }) => {
    return jsonResponse(requestId, {
      message: "TruthFinder API is running!",
      status: "healthy",
      endpoints: {
        analyze: "/agent/analyze",
        chat: "/api/v1/agent/chat",
        status: "/agent/status",
      },
    });
  });
}

export const OPTIONS = handlePreflight;
