import type { Logger } from "pino";
import {
  ConnectionError,
  InvalidIntentError,
  describeConnectionError,
  getErrorMessage,
  isWireError,
} from "../shared/errors.js";
import { describeResponse, type GreetdRequest, type GreetdResponse } from "../shared/messages.js";
import {
  AuthStateMachine,
  isTerminalPhase,
  type AuthNotice,
  type AuthPhase,
  type AuthSessionSnapshot,
  type FailureCause,
  type ProtocolViolation,
} from "./auth-machine.js";
import type { GreetdTransport } from "./greetd-transport.js";
import { RequestDispatcher } from "./request-dispatcher.js";
import { ResponseListener, type ListenerEvent } from "./response-listener.js";

const DEFAULT_WAIT_TIMEOUT_MS = 30000;

export type ConnectionState =
  | { status: "connected" }
  | { status: "absent"; reason: string }
  | { status: "lost"; error: ConnectionError }
  | { status: "closed" };

export type GreeterEvent =
  | { type: "phase"; phase: AuthPhase; previous: AuthPhase }
  | { type: "notice"; notice: AuthNotice }
  | { type: "violation"; violation: ProtocolViolation }
  | { type: "connection"; state: ConnectionState };

export type GreeterEventHandler = (event: GreeterEvent) => void;

export interface GreeterClientOptions {
  transport: GreetdTransport;
  logger: Logger;
}

type PhaseWaiter = {
  predicate: (phase: AuthPhase) => boolean;
  resolve: (phase: AuthPhase) => void;
  reject: (error: Error) => void;
  timeoutHandle: ReturnType<typeof setTimeout> | null;
};

type Connection = {
  transport: GreetdTransport;
  dispatcher: RequestDispatcher;
  listener: ResponseListener;
};

/**
 * Owns the authentication state machine. Responses arrive from the listener's
 * channel, intents from the caller; both run to completion on the event loop,
 * so the machine is never touched concurrently.
 */
export class GreeterClient {
  private readonly machine = new AuthStateMachine();
  private readonly logger: Logger;
  private readonly eventListeners = new Set<GreeterEventHandler>();
  private readonly waiters = new Set<PhaseWaiter>();
  private connection: Connection;
  private connectionState: ConnectionState;
  private pump: Promise<void> | null = null;
  private started = false;
  // Requests sent over a live connection whose responses have not arrived.
  private inFlight = 0;
  // Of those, how many belong to a cancelled attempt.
  private staleResponses = 0;
  // Next request, held back until the cancelled attempt is fully answered.
  private deferredRequest: GreetdRequest | null = null;

  constructor(options: GreeterClientOptions) {
    this.logger = options.logger.child({ module: "greeter-client" });
    this.connection = this.createConnection(options.transport);
    this.connectionState = stateForTransport(options.transport);
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(): void {
    if (this.started) return;
    if (this.connectionState.status === "closed") {
      throw new Error("Greeter client is closed");
    }
    this.started = true;
    this.startPump(this.connection);
  }

  async close(): Promise<void> {
    if (this.connectionState.status === "closed") return;
    const { transport, dispatcher, listener } = this.connection;
    this.setConnectionState({ status: "closed" });
    this.deferredRequest = null;
    listener.stop();
    try {
      await dispatcher.close();
    } catch (error) {
      this.logger.debug({ err: error }, "Writer already failed while closing");
    }
    transport.close();
    this.clearWaiters(new Error("Greeter client closed"));
    await this.pump;
  }

  /** Swaps in a fresh transport; framing restarts from a clean boundary. */
  reconnect(transport: GreetdTransport): void {
    if (this.connectionState.status === "closed") {
      throw new Error("Greeter client is closed");
    }
    const previous = this.connection;
    previous.listener.stop();
    previous.transport.close();

    this.connection = this.createConnection(transport);
    this.inFlight = 0;
    this.staleResponses = 0;
    this.deferredRequest = null;
    this.setConnectionState(stateForTransport(transport));
    this.logger.info({ transport: transport.description }, "Transport replaced");
    if (this.started) {
      this.startPump(this.connection);
    }
  }

  // ============================================================================
  // Intents
  // ============================================================================

  beginLogin(username: string): void {
    this.runIntent("begin login", () => this.machine.beginLogin(username));
  }

  supplyAuthValue(value: string): void {
    this.runIntent("supply an auth value", () => this.machine.supplyAuthValue(value));
  }

  chooseSession(command: string[], env: string[] = []): void {
    this.runIntent("start a session", () => this.machine.chooseSession(command, env));
  }

  cancel(): void {
    if (this.deferredRequest) {
      // greetd never saw the held request, so there is nothing to cancel on the wire.
      this.deferredRequest = null;
      this.runIntent("cancel", () => {
        this.machine.cancel();
        return null;
      });
      return;
    }
    this.runIntent("cancel", () => this.machine.cancel());
    if (this.inFlight > 0) {
      // Everything still unanswered, cancel_session included, belongs to the old attempt.
      this.staleResponses = this.inFlight;
      this.logger.debug({ stale: this.staleResponses }, "Marked outstanding responses stale");
    }
  }

  // ============================================================================
  // Observation
  // ============================================================================

  getPhase(): AuthPhase {
    return this.machine.getPhase();
  }

  getLastResponse(): GreetdResponse | null {
    return this.machine.getLastResponse();
  }

  getSnapshot(): AuthSessionSnapshot {
    return this.machine.getSnapshot();
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  get outstandingResponses(): number {
    return this.inFlight;
  }

  subscribe(handler: GreeterEventHandler): () => void {
    this.eventListeners.add(handler);
    return () => {
      this.eventListeners.delete(handler);
    };
  }

  waitForPhase(
    predicate: (phase: AuthPhase) => boolean,
    options?: { timeoutMs?: number }
  ): Promise<AuthPhase> {
    const current = this.machine.getPhase();
    if (predicate(current)) {
      return Promise.resolve(current);
    }
    if (this.connectionState.status === "closed") {
      return Promise.reject(new Error("Greeter client closed"));
    }

    const timeoutMs = options?.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    // Capture the stack at the call site, not inside setTimeout.
    const timeoutError = new Error(`Timeout waiting for phase (${timeoutMs}ms)`);

    return new Promise<AuthPhase>((resolve, reject) => {
      const waiter: PhaseWaiter = {
        predicate,
        resolve,
        reject,
        timeoutHandle: null,
      };
      if (timeoutMs > 0) {
        waiter.timeoutHandle = setTimeout(() => {
          this.waiters.delete(waiter);
          reject(timeoutError);
        }, timeoutMs);
      }
      this.waiters.add(waiter);
    });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private createConnection(transport: GreetdTransport): Connection {
    return {
      transport,
      dispatcher: new RequestDispatcher(transport.writer, this.logger),
      listener: new ResponseListener(transport.reader, this.logger),
    };
  }

  private startPump(connection: Connection): void {
    const previousPump = this.pump ?? Promise.resolve();
    const pump = this.drain(connection);
    this.pump = Promise.all([previousPump, pump]).then(() => undefined);
    void connection.listener.start();
  }

  private async drain(connection: Connection): Promise<void> {
    try {
      for await (const event of connection.listener.events) {
        if (connection !== this.connection || this.connectionState.status === "closed") {
          return;
        }
        this.handleListenerEvent(event);
      }
    } catch (error) {
      this.logger.error({ err: error }, "Inbound channel failed");
    }
  }

  private handleListenerEvent(event: ListenerEvent): void {
    switch (event.type) {
      case "response":
        this.handleResponse(event.response);
        return;
      case "closed":
        this.handleConnectionLost(new ConnectionError("lost", "greetd closed the connection"));
        return;
      case "failed":
        if (isWireError(event.error)) {
          this.handleProtocolError(event.error);
          return;
        }
        this.handleConnectionLost(
          event.error instanceof ConnectionError
            ? event.error
            : new ConnectionError("lost", getErrorMessage(event.error), { cause: event.error })
        );
        return;
    }
  }

  private handleResponse(response: GreetdResponse): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    if (this.staleResponses > 0) {
      this.staleResponses -= 1;
      this.logger.debug(
        { response: describeResponse(response), remaining: this.staleResponses },
        "Discarding response to a cancelled attempt"
      );
      if (this.staleResponses === 0 && this.deferredRequest) {
        const request = this.deferredRequest;
        this.deferredRequest = null;
        this.dispatch(request);
      }
      return;
    }

    const previous = this.machine.getPhase();
    const result = this.machine.receive(response);

    if (result.violation) {
      this.logger.warn(result.violation, "Protocol violation");
      this.emit({ type: "violation", violation: result.violation });
    }
    if (result.notice) {
      this.logger.info({ kind: result.notice.kind }, result.notice.message);
      this.emit({ type: "notice", notice: result.notice });
    }
    if (result.phase !== previous) {
      this.notifyPhase(previous);
    }
    if (result.send) {
      this.dispatch(result.send);
    }
  }

  private handleProtocolError(error: Error): void {
    this.logger.error({ err: error }, "Undecodable frame from greetd; dropping connection");
    const { transport, listener } = this.connection;
    listener.stop();
    transport.close();
    this.setConnectionState({
      status: "lost",
      error: new ConnectionError("lost", error.message, { cause: error }),
    });
    this.failActiveAttempt(`protocol error: ${error.message}`, "protocol");
  }

  private handleConnectionLost(error: ConnectionError): void {
    if (this.connectionState.status === "lost" || this.connectionState.status === "closed") {
      return;
    }
    this.logger.warn({ err: error }, "Connection to greetd lost");
    this.connection.listener.stop();
    this.connection.transport.close();
    this.setConnectionState({ status: "lost", error });
    this.failActiveAttempt(describeConnectionError(error), "connection");
  }

  private failActiveAttempt(reason: string, cause: FailureCause): void {
    this.inFlight = 0;
    this.staleResponses = 0;
    this.deferredRequest = null;
    const previous = this.machine.getPhase();
    if (previous.status === "idle" || isTerminalPhase(previous)) {
      return;
    }
    this.machine.fail(reason, cause);
    this.notifyPhase(previous);
  }

  private runIntent(intent: string, apply: () => GreetdRequest | null): void {
    if (this.connectionState.status === "closed") {
      throw new InvalidIntentError({
        intent,
        phase: this.machine.getPhase().status,
        message: "Greeter client is closed",
      });
    }
    this.start();
    const previous = this.machine.getPhase();
    const request = apply();
    if (this.machine.getPhase() !== previous) {
      this.notifyPhase(previous);
    }
    if (request) {
      this.dispatch(request);
    }
  }

  private dispatch(request: GreetdRequest): void {
    const state = this.connectionState;
    if (state.status === "lost") {
      this.failActiveAttempt(describeConnectionError(state.error), "connection");
      return;
    }
    const { dispatcher, transport } = this.connection;
    if (transport.kind === "connected") {
      if (this.staleResponses > 0) {
        this.deferredRequest = request;
        this.logger.debug(
          { request: request.type, stale: this.staleResponses },
          "Holding request until the cancelled attempt is answered"
        );
        return;
      }
      this.inFlight += 1;
    }
    void dispatcher.send(request).catch((error: unknown) => {
      if (this.connection.dispatcher !== dispatcher || this.connectionState.status === "closed") {
        return;
      }
      this.handleConnectionLost(
        error instanceof ConnectionError
          ? error
          : new ConnectionError("lost", getErrorMessage(error), { cause: error })
      );
    });
  }

  private notifyPhase(previous: AuthPhase): void {
    const phase = this.machine.getPhase();
    this.logger.debug({ from: previous.status, to: phase.status }, "Phase changed");
    this.emit({ type: "phase", phase, previous });
    this.resolveWaiters(phase);
  }

  private setConnectionState(state: ConnectionState): void {
    this.connectionState = state;
    this.emit({ type: "connection", state });
  }

  private emit(event: GreeterEvent): void {
    for (const handler of Array.from(this.eventListeners)) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn({ err: error, event: event.type }, "Event handler threw");
      }
    }
  }

  private resolveWaiters(phase: AuthPhase): void {
    for (const waiter of Array.from(this.waiters)) {
      if (!waiter.predicate(phase)) continue;
      this.waiters.delete(waiter);
      if (waiter.timeoutHandle) {
        clearTimeout(waiter.timeoutHandle);
      }
      waiter.resolve(phase);
    }
  }

  private clearWaiters(error: Error): void {
    for (const waiter of Array.from(this.waiters)) {
      this.waiters.delete(waiter);
      if (waiter.timeoutHandle) {
        clearTimeout(waiter.timeoutHandle);
      }
      waiter.reject(error);
    }
  }
}

function stateForTransport(transport: GreetdTransport): ConnectionState {
  return transport.kind === "connected"
    ? { status: "connected" }
    : { status: "absent", reason: transport.reason };
}
