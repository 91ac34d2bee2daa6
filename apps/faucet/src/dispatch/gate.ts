/**
 * Gate results for the dispatch pipeline.
 *
 * Each step returns either its value or a rejection naming the gate that
 * failed; the pipeline stops at the first rejection.
 */

export type GateName =
  | "validation"
  | "challenge_issuance"
  | "daily_limit"
  | "token_throttle"
  | "pow"
  | "distribution_cap"
  | "reserve_protection"
  | "transfer";

export type RejectionStatus = 400 | 429 | 500 | 503;

export type RejectionDetail = Record<string, string | number | null>;

export interface Rejection {
  gate: GateName;
  status: RejectionStatus;
  /** Machine-readable code, sent as `error`. */
  code: string;
  message: string;
  detail: RejectionDetail;
}

export type GateResult<T> = { ok: true; value: T } | { ok: false; rejection: Rejection };

export function pass<T>(value: T): GateResult<T> {
  return { ok: true, value };
}

export function reject<T>(
  gate: GateName,
  status: RejectionStatus,
  code: string,
  message: string,
  detail: RejectionDetail = {},
): GateResult<T> {
  return { ok: false, rejection: { gate, status, code, message, detail } };
}

export type RejectionBody = RejectionDetail & {
  error: string;
  message: string;
  gate: GateName;
};

/** Wire body for a rejection: `{ error, message, gate, ...detail }`. */
export function rejectionBody(rejection: Rejection): RejectionBody {
  return {
    ...rejection.detail,
    error: rejection.code,
    message: rejection.message,
    gate: rejection.gate,
  };
}
