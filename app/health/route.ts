import { handlePreflight, handleStandaloneRoute, jsonResponse } from "@/backend/transport/rest/pipeline";

export const runtime = "nodejs";

export async function GET(request: Request): Promise<Response> {
  return handleStandaloneRoute(request, async ({ requestId }) => {
    return jsonResponse(requestId, {
      status: "healthy",
      service: "truthfinder-api",
      timestamp: new Date().toISOString(),
    });
  });
}

export const OPTIONS = handlePreflight;
