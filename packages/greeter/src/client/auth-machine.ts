import { InvalidIntentError } from "../shared/errors.js";
import {
  cancelSessionRequest,
  createSessionRequest,
  describeResponse,
  postAuthMessageResponse,
  startSessionRequest,
  type AuthMessageResponse,
  type ErrorType,
  type GreetdRequest,
  type GreetdResponse,
} from "../shared/messages.js";

export type AuthPrompt = {
  kind: "visible" | "secret";
  message: string;
};

export type AuthNotice = {
  kind: "info" | "error";
  message: string;
};

export type FailureCause = ErrorType | "connection" | "protocol";

export type AuthPhase =
  | { status: "idle" }
  | { status: "awaiting_session_creation"; username: string }
  | { status: "awaiting_auth_response"; username: string; prompt: AuthPrompt }
  | { status: "awaiting_login_result"; username: string }
  | { status: "ready_to_start_session"; username: string }
  | { status: "starting_session"; username: string; command: string[] }
  | { status: "session_started"; username: string; command: string[] }
  | { status: "failed"; reason: string; cause: FailureCause; username: string | null };

export type AuthPhaseStatus = AuthPhase["status"];

export type ProtocolViolation = {
  phase: AuthPhaseStatus;
  response: string;
  message: string;
};

export type Transition = {
  phase: AuthPhase;
  send: GreetdRequest | null;
  notice: AuthNotice | null;
  violation: ProtocolViolation | null;
  consumedQueuedValue: boolean;
};

export type AuthSessionSnapshot = {
  phase: AuthPhase;
  username: string | null;
  lastResponse: GreetdResponse | null;
  hasQueuedValue: boolean;
};

export const IDLE_PHASE: AuthPhase = { status: "idle" };

export function isTerminalPhase(phase: AuthPhase): boolean {
  return phase.status === "failed" || phase.status === "session_started";
}

export function phaseUsername(phase: AuthPhase): string | null {
  return phase.status === "idle" ? null : phase.username;
}

function outcome(phase: AuthPhase, extra?: Partial<Omit<Transition, "phase">>): Transition {
  return {
    phase,
    send: extra?.send ?? null,
    notice: extra?.notice ?? null,
    violation: extra?.violation ?? null,
    consumedQueuedValue: extra?.consumedQueuedValue ?? false,
  };
}

function violation(phase: AuthPhase, response: GreetdResponse, message: string): Transition {
  return outcome(phase, {
    violation: { phase: phase.status, response: describeResponse(response), message },
  });
}

function onAuthMessage(
  phase: AuthPhase,
  username: string,
  response: AuthMessageResponse,
  queuedValue: string | null
): Transition {
  switch (response.auth_message_type) {
    case "visible":
    case "secret": {
      if (queuedValue !== null) {
        return outcome(
          { status: "awaiting_login_result", username },
          { send: postAuthMessageResponse(queuedValue), consumedQueuedValue: true }
        );
      }
      return outcome({
        status: "awaiting_auth_response",
        username,
        prompt: { kind: response.auth_message_type, message: response.auth_message },
      });
    }
    case "info":
    case "error":
      // Notices carry nothing to answer, but greetd still waits for a reply.
      return outcome(phase, {
        send: postAuthMessageResponse(null),
        notice: { kind: response.auth_message_type, message: response.auth_message },
      });
  }
}

/**
 * Total transition function over (phase, response). Anything not expected in
 * the current phase is reported as a violation and leaves the phase unchanged.
 */
export function transition(
  phase: AuthPhase,
  response: GreetdResponse,
  queuedValue: string | null = null
): Transition {
  switch (phase.status) {
    case "idle":
      return violation(phase, response, "No login attempt in progress");

    case "awaiting_session_creation":
    case "awaiting_auth_response":
    case "awaiting_login_result":
      switch (response.type) {
        case "success":
          return outcome({ status: "ready_to_start_session", username: phase.username });
        case "error":
          return outcome({
            status: "failed",
            reason: response.description,
            cause: response.error_type,
            username: phase.username,
          });
        case "auth_message":
          return onAuthMessage(phase, phase.username, response, queuedValue);
      }
      break;

    case "ready_to_start_session":
      if (response.type === "error") {
        return outcome({
          status: "failed",
          reason: response.description,
          cause: response.error_type,
          username: phase.username,
        });
      }
      return violation(phase, response, "Authentication already complete; no request pending");

    case "starting_session":
      switch (response.type) {
        case "success":
          return outcome({
            status: "session_started",
            username: phase.username,
            command: phase.command,
          });
        case "error":
          return outcome({
            status: "failed",
            reason: response.description,
            cause: response.error_type,
            username: phase.username,
          });
        case "auth_message":
          return violation(phase, response, "Prompt received while starting the session");
      }
      break;

    case "session_started":
      return violation(phase, response, "Session already started");

    case "failed":
      return violation(phase, response, "Login attempt already failed");
  }
}

/**
 * Owns the state of one login attempt. Response-driven changes go through
 * `transition`; caller intents are methods that return the request to send.
 */
export class AuthStateMachine {
  private phase: AuthPhase = IDLE_PHASE;
  private queuedValue: string | null = null;
  private lastResponse: GreetdResponse | null = null;

  getPhase(): AuthPhase {
    return this.phase;
  }

  getLastResponse(): GreetdResponse | null {
    return this.lastResponse;
  }

  getSnapshot(): AuthSessionSnapshot {
    return {
      phase: this.phase,
      username: phaseUsername(this.phase),
      lastResponse: this.lastResponse,
      hasQueuedValue: this.queuedValue !== null,
    };
  }

  receive(response: GreetdResponse): Transition {
    const result = transition(this.phase, response, this.queuedValue);
    this.lastResponse = response;
    this.phase = result.phase;
    if (result.consumedQueuedValue || isTerminalPhase(result.phase)) {
      this.queuedValue = null;
    }
    return result;
  }

  beginLogin(username: string): GreetdRequest {
    if (!isTerminalPhase(this.phase) && this.phase.status !== "idle") {
      throw new InvalidIntentError({ intent: "begin login", phase: this.phase.status });
    }
    if (!username.trim()) {
      throw new InvalidIntentError({
        intent: "begin login",
        phase: this.phase.status,
        message: "Username is required",
      });
    }
    this.phase = { status: "awaiting_session_creation", username };
    this.queuedValue = null;
    this.lastResponse = null;
    return createSessionRequest(username);
  }

  /**
   * Answers the pending prompt, or holds the value for the next visible/secret
   * prompt while a request is still in flight. Returns null when held.
   */
  supplyAuthValue(value: string): GreetdRequest | null {
    switch (this.phase.status) {
      case "awaiting_auth_response":
        this.phase = { status: "awaiting_login_result", username: this.phase.username };
        this.queuedValue = null;
        return postAuthMessageResponse(value);
      case "awaiting_session_creation":
      case "awaiting_login_result":
        this.queuedValue = value;
        return null;
      default:
        throw new InvalidIntentError({ intent: "supply an auth value", phase: this.phase.status });
    }
  }

  chooseSession(command: string[], env: string[] = []): GreetdRequest {
    if (this.phase.status !== "ready_to_start_session") {
      throw new InvalidIntentError({ intent: "start a session", phase: this.phase.status });
    }
    if (command.length === 0 || !command[0].trim()) {
      throw new InvalidIntentError({
        intent: "start a session",
        phase: this.phase.status,
        message: "Session command is required",
      });
    }
    this.phase = {
      status: "starting_session",
      username: this.phase.username,
      command: [...command],
    };
    return startSessionRequest(command, env);
  }

  /** Returns the cancel request to send, or null when there is nothing to cancel. */
  cancel(): GreetdRequest | null {
    const previous = this.phase;
    if (previous.status === "idle" || previous.status === "session_started") {
      return null;
    }
    this.phase = IDLE_PHASE;
    this.queuedValue = null;
    // greetd tears the session down itself after an error response.
    return previous.status === "failed" ? null : cancelSessionRequest();
  }

  /** Marks the attempt failed for reasons outside the protocol (connection, framing). */
  fail(reason: string, cause: FailureCause): void {
    this.phase = { status: "failed", reason, cause, username: phaseUsername(this.phase) };
    this.queuedValue = null;
  }
}
