import { DriveError, messageOf } from "@mailstash/shared";

export interface SuccessPayload {
  ok: true;
  data: unknown;
}

export interface FailurePayload {
  ok: false;
  error: string;
  kind: string;
  /** --debug only */
  details?: Record<string, unknown>;
  causes?: string[];
  stack?: string;
}

export function successPayload(data: unknown): SuccessPayload {
  return { ok: true, data };
}

/**
 * JSON shape of a failed command. Errors we don't raise ourselves are
 * reported as kind "internal".
 */
export function failurePayload(err: unknown, debug: boolean): FailurePayload {
  const payload: FailurePayload = {
    ok: false,
    error: messageOf(err),
    kind: err instanceof DriveError ? err.kind : "internal",
  };
  if (!debug) return payload;

  if (err instanceof DriveError) payload.details = err.details();

  const causes: string[] = [];
  let cause = err instanceof Error ? err.cause : undefined;
  while (cause !== undefined && causes.length < 10) {
    causes.push(messageOf(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  if (causes.length > 0) payload.causes = causes;
  if (err instanceof Error && err.stack) payload.stack = err.stack;
  return payload;
}
