export class ApplicationError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "ApplicationError";
  }
}

export class ValidationError extends ApplicationError {
  constructor(message: string) {
    super("validation_error", message, 400);
    this.name = "ValidationError";
  }
}

export class AnalysisUnavailableError extends ApplicationError {
  constructor(message = "Analysis is temporarily unavailable. Please try again later.") {
    super("analysis_unavailable", message, 503);
    this.name = "AnalysisUnavailableError";
  }
}

export class StoreUnavailableError extends ApplicationError {
  constructor(message = "Chat history store is unavailable") {
    super("store_unavailable", message, 503);
    this.name = "StoreUnavailableError";
  }
}
