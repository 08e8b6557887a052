/** Invalid run input. Raised before any source is called. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The calendar for one year/month could not be listed. */
export class SourceUnavailableError extends Error {
  constructor(
    readonly year: number,
    readonly month: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SourceUnavailableError";
  }
}

export class ExportFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportFailure";
  }
}

export class InvalidTransitionError extends Error {
  constructor(identifier: string, from: string, to: string) {
    super(`Record ${identifier} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class ReportFinalizedError extends Error {
  constructor() {
    super("Report is finalized and can no longer be modified");
    this.name = "ReportFinalizedError";
  }
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
