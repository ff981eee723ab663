import type { ZodType } from "zod";

import { ConsoleLogger } from "@/backend/adapters/logging/console-logger";
import { loadCorsOrigins } from "@/backend/composition/config";
import type { ApplicationContainer } from "@/backend/composition/container";
import { getApplicationContainer } from "@/backend/composition/container";
import { ApiError, toErrorResponse } from "@/backend/transport/rest/api-error";

export interface ApiRequestContext {
  requestId: string;
  container: ApplicationContainer;
}

const CORS_ALLOWED_METHODS = "GET, POST, OPTIONS";
const CORS_ALLOWED_HEADERS = "content-type, authorization, x-request-id";

// Used when there is no container: standalone routes, or a configuration that fails to load.
const fallbackLogger = new ConsoleLogger({ scope: "http" });

export async function handleApiRoute(
  request: Request,
  handler: (context: ApiRequestContext) => Promise<Response>,
): Promise<Response> {
  const requestId = getOrCreateRequestId(request);

  let container: ApplicationContainer | undefined;
  let response: Response;
  try {
    container = getApplicationContainer();
    response = await handler({
      requestId,
      container,
    });
  } catch (error) {
    response = toErrorResponse(error, requestId, container?.logger.child("http") ?? fallbackLogger);
  }

  return finalizeResponse(request, response, requestId, container?.config.http.corsOrigins ?? loadCorsOrigins());
}

/** Same envelope, request id and CORS handling as `handleApiRoute`, without building the container. */
export async function handleStandaloneRoute(
  request: Request,
  handler: (context: { requestId: string }) => Promise<Response>,
): Promise<Response> {
  const requestId = getOrCreateRequestId(request);

  let response: Response;
  try {
    response = await handler({ requestId });
  } catch (error) {
    response = toErrorResponse(error, requestId, fallbackLogger);
  }

  return finalizeResponse(request, response, requestId, loadCorsOrigins());
}

export async function handlePreflight(request: Request): Promise<Response> {
  return handleStandaloneRoute(request, async ({ requestId }) => {
    return new Response(null, {
      status: 204,
      headers: {
        "x-request-id": requestId,
        "access-control-allow-methods": CORS_ALLOWED_METHODS,
        "access-control-allow-headers": CORS_ALLOWED_HEADERS,
        "access-control-max-age": "600",
      },
    });
  });
}

export function jsonResponse(requestId: string, payload: unknown, status = 200): Response {
  return Response.json(payload, {
    status,
    headers: {
      "x-request-id": requestId,
    },
  });
}

export async function parseJsonBody<T>(request: Request, schema: ZodType<T>): Promise<T> {
  let body: unknown;

  try {
    body = await request.json();
  } catch {
    throw new ApiError(400, "invalid_json", "Request body must be valid JSON");
  }

  return schema.parse(body);
}

export function getOrCreateRequestId(request: Request): string {
  const requestId = request.headers.get("x-request-id")?.trim();
  if (requestId) {
    return requestId;
  }

  return crypto.randomUUID();
}

export function resolveAllowedOrigin(request: Request, corsOrigins: readonly string[]): string | null {
  const origin = request.headers.get("origin")?.trim();
  if (!origin) {
    return null;
  }

  if (corsOrigins.includes("*")) {
    return "*";
  }

  return corsOrigins.includes(origin.replace(/\/+$/, "")) ? origin : null;
}

function finalizeResponse(
  request: Request,
  response: Response,
  requestId: string,
  corsOrigins: readonly string[],
): Response {
  const headers = new Headers(response.headers);
  if (!headers.has("x-request-id")) {
    headers.set("x-request-id", requestId);
  }

  const allowedOrigin = resolveAllowedOrigin(request, corsOrigins);
  if (allowedOrigin) {
    headers.set("access-control-allow-origin", allowedOrigin);
    if (allowedOrigin !== "*") {
      headers.set("access-control-allow-credentials", "true");
      headers.append("vary", "Origin");
    }
  }

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
