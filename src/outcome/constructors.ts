import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(failure(reason, message, opts), meta);
}
