export type FailureReason =
  | "file-not-found"
  | "unsupported-format"
  | "parse-failed"
  | "read-failed";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return { reason, message, context: opts?.context };
}

/** Restate a failure for an outer caller, keeping its reason and merging context. */
export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    reason: inner.reason,
    message,
    context: { ...inner.context, ...context },
  };
}
