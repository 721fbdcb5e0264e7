import type { Logger } from "pino";
import { describeResponse, type GreetdResponse } from "../shared/messages.js";
import { decodeFrames, type FrameDecoderOptions } from "../shared/frame-codec.js";
import { Pushable } from "../shared/pushable.js";
import type { ByteReader } from "./greetd-transport.js";

export type ListenerEvent =
  | { type: "response"; response: GreetdResponse }
  | { type: "closed" }
  | { type: "failed"; error: unknown };

/**
 * Sole owner of the transport's read half. Decodes frames and hands them to the
 * state-machine owner through an unbounded channel; ends with exactly one
 * `closed` or `failed` event.
 */
export class ResponseListener {
  private readonly channel = new Pushable<ListenerEvent>();
  private readonly logger: Logger;
  private running: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private readonly reader: ByteReader,
    logger: Logger,
    private readonly options?: FrameDecoderOptions
  ) {
    this.logger = logger.child({ module: "response-listener" });
  }

  get events(): AsyncIterable<ListenerEvent> {
    return this.channel;
  }

  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  /** Stops delivering events; the read loop ends when the transport closes. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.channel.end();
  }

  private async run(): Promise<void> {
    try {
      // No read timeout: the daemon may stay silent while a user types.
      for await (const response of decodeFrames(this.reader.chunks(), this.options)) {
        this.logger.debug({ response: describeResponse(response) }, "Response received");
        this.channel.push({ type: "response", response });
      }
      this.logger.debug("Daemon stream ended");
      this.channel.push({ type: "closed" });
    } catch (error) {
      if (!this.stopped) {
        this.logger.warn({ err: error }, "Response listener failed");
      }
      this.channel.push({ type: "failed", error });
    } finally {
      this.channel.end();
    }
  }
}
