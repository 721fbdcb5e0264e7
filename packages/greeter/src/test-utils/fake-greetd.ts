import { PassThrough } from "node:stream";
import { createStreamTransport, type ConnectedTransport } from "../client/greetd-transport.js";
import { createRequestDecoder, encodeResponse } from "../shared/frame-codec.js";
import type {
  AuthMessageType,
  GreetdRequest,
  GreetdResponse,
} from "../shared/messages.js";

export interface FakeGreetdAccount {
  password: string;
  /** Adds a visible prompt for a one-time code before the password. */
  otp?: string;
  /** Info messages sent before the first prompt. */
  notices?: string[];
}

type AuthStep = {
  kind: AuthMessageType;
  message: string;
  expected: string | null;
};

type DaemonSession =
  | { state: "none" }
  | { state: "authenticating"; username: string; steps: AuthStep[]; answers: Array<string | null> }
  | { state: "authenticated"; username: string }
  | { state: "started"; username: string; command: string[]; env: string[] };

export const AUTH_FAILED_DESCRIPTION = "pam_authenticate: AUTH_ERR";

/**
 * In-process stand-in for greetd over a pair of PassThrough streams. Mirrors
 * the daemon's session bookkeeping closely enough to drive a real client.
 */
export class FakeGreetd {
  readonly requests: GreetdRequest[] = [];
  readonly decodeErrors: unknown[] = [];
  readonly transport: ConnectedTransport;
  started: { username: string; command: string[]; env: string[] } | null = null;

  private readonly toDaemon = new PassThrough();
  private readonly toClient = new PassThrough();
  private readonly decoder = createRequestDecoder();
  private readonly accounts: Record<string, FakeGreetdAccount>;
  private session: DaemonSession = { state: "none" };
  private held: GreetdResponse[] | null = null;
  private requestWaiters: Array<{ count: number; resolve: () => void }> = [];

  constructor(options: { accounts: Record<string, FakeGreetdAccount> }) {
    this.accounts = options.accounts;
    this.transport = createStreamTransport({
      readable: this.toClient,
      writable: this.toDaemon,
      description: "fake-greetd",
    });
    this.toDaemon.on("data", (chunk: Buffer) => this.onData(chunk));
  }

  get sessionState(): DaemonSession["state"] {
    return this.session.state;
  }

  /** Queues responses instead of writing them until `release()`. */
  hold(): void {
    this.held ??= [];
  }

  release(): void {
    const held = this.held ?? [];
    this.held = null;
    for (const response of held) {
      this.send(response);
    }
  }

  send(response: GreetdResponse): void {
    if (this.held) {
      this.held.push(response);
      return;
    }
    this.toClient.write(encodeResponse(response));
  }

  sendRaw(bytes: Uint8Array): void {
    this.toClient.write(bytes);
  }

  /** Ends the daemon's side of the stream, as if greetd exited. */
  disconnect(): void {
    this.toClient.end();
  }

  /** Resolves once at least `count` requests have been received. */
  waitForRequests(count: number): Promise<void> {
    if (this.requests.length >= count) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.requestWaiters.push({ count, resolve });
    });
  }

  private onData(chunk: Buffer): void {
    let requests: GreetdRequest[];
    try {
      requests = this.decoder.push(chunk);
    } catch (error) {
      this.decodeErrors.push(error);
      return;
    }
    for (const request of requests) {
      this.requests.push(request);
      this.handle(request);
    }
    this.requestWaiters = this.requestWaiters.filter((waiter) => {
      if (this.requests.length < waiter.count) return true;
      waiter.resolve();
      return false;
    });
  }

  private handle(request: GreetdRequest): void {
    switch (request.type) {
      case "create_session":
        this.createSession(request.username);
        return;
      case "post_auth_message_response":
        this.postResponse(request.response);
        return;
      case "start_session":
        if (this.session.state !== "authenticated") {
          this.fail("error", "session not yet authenticated");
          return;
        }
        this.session = {
          state: "started",
          username: this.session.username,
          command: request.command,
          env: request.env,
        };
        this.started = {
          username: this.session.username,
          command: request.command,
          env: request.env,
        };
        this.send({ type: "success" });
        return;
      case "cancel_session":
        this.session = { state: "none" };
        this.send({ type: "success" });
        return;
    }
  }

  private createSession(username: string): void {
    if (this.session.state !== "none") {
      this.fail("error", "a session is already being configured");
      return;
    }
    const account = this.accounts[username];
    const steps: AuthStep[] = [
      ...(account?.notices ?? []).map((message) => ({
        kind: "info" as const,
        message,
        expected: null,
      })),
    ];
    if (account?.otp !== undefined) {
      steps.push({ kind: "visible", message: "Verification code:", expected: account.otp });
    }
    // Unknown users still get a password prompt, as PAM does.
    steps.push({ kind: "secret", message: "Password:", expected: account?.password ?? null });

    this.session = { state: "authenticating", username, steps, answers: [] };
    this.promptNext();
  }

  private postResponse(response: string | null): void {
    const session = this.session;
    if (session.state !== "authenticating" || session.answers.length >= session.steps.length) {
      this.fail("error", "no auth message pending");
      return;
    }
    session.answers.push(response);
    if (session.answers.length < session.steps.length) {
      this.promptNext();
      return;
    }

    const accepted =
      this.accounts[session.username] !== undefined &&
      session.steps.every((step, index) => step.expected === session.answers[index]);
    if (!accepted) {
      this.fail("auth_error", AUTH_FAILED_DESCRIPTION);
      return;
    }
    this.session = { state: "authenticated", username: session.username };
    this.send({ type: "success" });
  }

  private promptNext(): void {
    if (this.session.state !== "authenticating") return;
    const step = this.session.steps[this.session.answers.length];
    this.send({
      type: "auth_message",
      auth_message_type: step.kind,
      auth_message: step.message,
    });
  }

  // greetd drops the session whenever it reports an error.
  private fail(errorType: "auth_error" | "error", description: string): void {
    this.session = { state: "none" };
    this.send({ type: "error", error_type: errorType, description });
  }
}
