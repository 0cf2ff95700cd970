import type { ZodIssue } from "zod";

export type PipelineErrorCode =
  | "scrape_unavailable"
  | "analysis_unavailable"
  | "no_data"
  | "validation_error";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The scrape collaborator failed while its task was running in the queue. */
export class ScrapeUnavailable extends PipelineError {
  readonly code = "scrape_unavailable";
}

/** One analysis call failed, returned non-2xx, or came back empty. */
export class AnalysisUnavailable extends PipelineError {
  readonly code = "analysis_unavailable";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type NoDataReason = "empty_window" | "analysis_failed" | "no_input";

export class NoDataError extends PipelineError {
  readonly code = "no_data";

  constructor(readonly reason: NoDataReason, message: string) {
    super(message);
  }
}

export class ValidationError extends PipelineError {
  readonly code = "validation_error";

  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super(message);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
