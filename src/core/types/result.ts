export type ParseError =
  | {
      reason: "Unrecognized";
      rawText: string;
    }
  | {
      reason: "MissingArgument";
      slotName: string;
      rawText: string;
    };

export type RejectionReason = "NoActiveProject" | "InvalidArgument";

export type FailureReason =
  | "AlreadyExists"
  | "NotFound"
  | "BackupFailed"
  | "GenerationFailed"
  | "TranscriptionError"
  | "RateLimited"
  | "Timeout"
  | "CollaboratorError";

export interface OkResult<P> {
  status: "ok";
  message: string;
  payload: P;
}

export interface RejectedResult {
  status: "rejected";
  reason: RejectionReason;
  message: string;
}

export interface FailedResult<P> {
  status: "failed";
  reason: FailureReason;
  message: string;
  /** Collaborator report attached to a failure (e.g. a failing test run). */
  payload?: P;
}

export type Result<P> = OkResult<P> | RejectedResult | FailedResult<P>;
