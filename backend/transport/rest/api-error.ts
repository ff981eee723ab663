import { ZodError } from "zod";

import { ApplicationError } from "@/backend/application/errors";
import type { Logger } from "@/backend/ports/logger";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function toErrorResponse(error: unknown, requestId: string, logger?: Logger): Response {
  const normalized = normalizeError(error);

  if (normalized.status >= 500) {
    logger?.error("Request failed", {
      requestId,
      code: normalized.code,
      error: error instanceof Error ? error.stack ?? error.message : String(error),
    });
  }

  return Response.json(
    {
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details,
      },
      requestId,
    },
    {
      status: normalized.status,
      headers: {
        "x-request-id": requestId,
      },
    },
  );
}

export function normalizeError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ApplicationError) {
    return new ApiError(error.status, error.code, error.message);
  }

  if (error instanceof ZodError) {
    return new ApiError(400, "invalid_request", "Request validation failed", error.issues);
  }

  return new ApiError(500, "internal_error", "Internal server error. Please try again.");
}
