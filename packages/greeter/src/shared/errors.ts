import type { ZodIssue } from "zod";

export type ConnectionErrorReason = "unavailable" | "lost";

export const LOGIN_SERVICE_UNREACHABLE = "cannot reach login service";

export class ConnectionError extends Error {
  readonly reason: ConnectionErrorReason;

  constructor(reason: ConnectionErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
    this.reason = reason;
  }
}

export class MalformedFrameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedFrameError";
  }
}

export class ProtocolDecodeError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, options?: { cause?: unknown; issues?: ZodIssue[] }) {
    super(message, { cause: options?.cause });
    this.name = "ProtocolDecodeError";
    this.issues = options?.issues ?? [];
  }
}

/** Thrown when the caller asks for something the current phase does not allow. */
export class InvalidIntentError extends Error {
  readonly intent: string;
  readonly phase: string;

  constructor(params: { intent: string; phase: string; message?: string }) {
    super(params.message ?? `Cannot ${params.intent} while ${params.phase}`);
    this.name = "InvalidIntentError";
    this.intent = params.intent;
    this.phase = params.phase;
  }
}

export function isWireError(error: unknown): error is MalformedFrameError | ProtocolDecodeError {
  return error instanceof MalformedFrameError || error instanceof ProtocolDecodeError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function describeConnectionError(error: ConnectionError): string {
  const detail = error.message.trim();
  if (!detail) {
    return LOGIN_SERVICE_UNREACHABLE;
  }
  return `${LOGIN_SERVICE_UNREACHABLE}: ${detail}`;
}
