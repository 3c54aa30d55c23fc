import type {
  FailedResult,
  FailureReason,
  OkResult,
  RejectedResult,
  RejectionReason,
  Result,
  ResultPayload
} from "./types.js";

export function ok<P extends ResultPayload>(message: string, payload: P): OkResult<P> {
  return { status: "ok", message, payload };
}

export function rejected(reason: RejectionReason, message: string): RejectedResult {
  return { status: "rejected", reason, message };
}

export function failed<P extends ResultPayload = never>(reason: FailureReason, message: string, payload?: P): FailedResult<P> {
  return payload === undefined ? { status: "failed", reason, message } : { status: "failed", reason, message, payload };
}

export function isOk<P>(result: Result<P>): result is OkResult<P> {
  return result.status === "ok";
}

export function describeOutcome(result: Result<unknown>): string {
  if (result.status === "ok") return "ok";
  return `${result.status}:${result.reason}`;
}
