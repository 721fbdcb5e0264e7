import type { Logger } from "pino";
import { ConnectionError, getErrorMessage } from "../shared/errors.js";
import { encodeRequest } from "../shared/frame-codec.js";
import type { GreetdRequest } from "../shared/messages.js";
import type { ByteWriter } from "./greetd-transport.js";

/**
 * Sole owner of the transport's write half. Requests are written in the order
 * `send` is called, each frame fully flushed before the next one starts.
 */
export class RequestDispatcher {
  private tail: Promise<void> = Promise.resolve();
  private failure: ConnectionError | null = null;
  private pending = 0;
  private readonly logger: Logger;

  constructor(
    private readonly writer: ByteWriter,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "request-dispatcher" });
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  get pendingWrites(): number {
    return this.pending;
  }

  /** Resolves once the frame is flushed; never blocks the caller's enqueue. */
  send(request: GreetdRequest): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.lostError());
    }

    this.pending += 1;
    const run = this.tail.then(() => this.write(request));
    this.tail = run.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      }
    );
    return run;
  }

  /** Resolves when every request sent so far has been written or rejected. */
  flushed(): Promise<void> {
    return this.tail;
  }

  async close(): Promise<void> {
    await this.tail;
    await this.writer.close();
  }

  private async write(request: GreetdRequest): Promise<void> {
    if (this.failure) {
      throw this.lostError();
    }
    const frame = encodeRequest(request);
    try {
      await this.writer.write(frame);
      this.logger.debug({ type: request.type, bytes: frame.byteLength }, "Request sent");
    } catch (error) {
      this.failure =
        error instanceof ConnectionError
          ? error
          : new ConnectionError("lost", `Write failed: ${getErrorMessage(error)}`, { cause: error });
      this.logger.warn({ err: error, type: request.type }, "Failed to send request");
      throw this.failure;
    }
  }

  private lostError(): ConnectionError {
    return new ConnectionError("lost", "Connection lost; request not sent", {
      cause: this.failure ?? undefined,
    });
  }
}
