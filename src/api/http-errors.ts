import { isPipelineError } from "../pipeline/errors";
import type { PipelineErrorCode } from "../pipeline/errors";

export type ErrorStatus = 400 | 404 | 500 | 502;

export interface ErrorBody {
  error: PipelineErrorCode | "internal_error";
  message: string;
}

export function statusFor(error: unknown): ErrorStatus {
  if (!isPipelineError(error)) return 500;
  switch (error.code) {
    case "validation_error":
      return 400;
    case "no_data":
      return 404;
    case "scrape_unavailable":
    case "analysis_unavailable":
      return 502;
  }
}

/** Unknown errors keep their message out of the response. */
export function errorBody(error: unknown): ErrorBody {
  if (isPipelineError(error)) {
    return { error: error.code, message: error.message };
  }
  return { error: "internal_error", message: "Internal server error" };
}
