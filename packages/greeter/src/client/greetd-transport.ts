import net from "node:net";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";
import type { GreeterConfig } from "../runtime/config.js";
import {
  formatDaemonAddress,
  parseDaemonAddress,
  type GreetdAddress,
} from "../shared/daemon-endpoints.js";
import { ConnectionError, getErrorMessage } from "../shared/errors.js";
import { asUint8Array } from "../shared/frame-codec.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/** Read half. Only one consumer may claim the chunk stream. */
export interface ByteReader {
  chunks(): AsyncIterable<Uint8Array>;
}

/** Write half. `write` resolves once the bytes are flushed to the stream. */
export interface ByteWriter {
  readonly closed: boolean;
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

type TransportBase = {
  description: string;
  reader: ByteReader;
  writer: ByteWriter;
  close: () => void;
};

export type ConnectedTransport = TransportBase & { kind: "connected" };

/** Stand-in used when no daemon is reachable and debug mode allows it. */
export type AbsentTransport = TransportBase & { kind: "absent"; reason: string };

export type GreetdTransport = ConnectedTransport | AbsentTransport;

export type TransportOpenConfig = Pick<GreeterConfig, "daemonSocket" | "debug" | "connectTimeoutMs">;

function claimOnce(label: string): () => void {
  let claimed = false;
  return () => {
    if (claimed) {
      throw new Error(`${label} already has an owner`);
    }
    claimed = true;
  };
}

export function createStreamTransport(params: {
  readable: Readable;
  writable: Writable;
  description: string;
  destroy?: () => void;
}): ConnectedTransport {
  const { readable, writable, description } = params;
  const claimReader = claimOnce("Transport read half");

  async function* readChunks(): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      for await (const chunk of readable) {
        const bytes = asUint8Array(chunk);
        if (bytes && bytes.byteLength > 0) {
          yield bytes;
        }
      }
    } catch (error) {
      throw new ConnectionError("lost", `Read from ${description} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  const isWritableClosed = () =>
    writable.destroyed || writable.writableEnded || writable.writableFinished;

  const writer: ByteWriter = {
    get closed() {
      return isWritableClosed();
    },
    write: (bytes) =>
      new Promise<void>((resolve, reject) => {
        if (isWritableClosed()) {
          reject(new ConnectionError("lost", `Connection to ${description} is closed`));
          return;
        }
        writable.write(bytes, (error) => {
          if (error) {
            reject(
              new ConnectionError("lost", `Write to ${description} failed: ${error.message}`, {
                cause: error,
              })
            );
            return;
          }
          resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve) => {
        if (isWritableClosed()) {
          resolve();
          return;
        }
        writable.end(() => resolve());
      }),
  };

  return {
    kind: "connected",
    description,
    reader: {
      chunks: () => {
        claimReader();
        return readChunks();
      },
    },
    writer,
    close: () => {
      if (params.destroy) {
        params.destroy();
        return;
      }
      readable.destroy();
      writable.destroy();
    },
  };
}

export function createAbsentTransport(reason: string, logger: Logger): AbsentTransport {
  const log = logger.child({ module: "transport", transport: "absent" });
  const claimReader = claimOnce("Transport read half");
  let closed = false;
  let signalClosed: () => void = () => {};
  const closedPromise = new Promise<void>((resolve) => {
    signalClosed = resolve;
  });

  async function* readNothing(): AsyncGenerator<Uint8Array, void, undefined> {
    await closedPromise;
  }

  const close = () => {
    if (closed) return;
    closed = true;
    signalClosed();
  };

  return {
    kind: "absent",
    reason,
    description: "no daemon",
    reader: {
      chunks: () => {
        claimReader();
        return readNothing();
      },
    },
    writer: {
      get closed() {
        return closed;
      },
      write: async (bytes) => {
        log.debug({ bytes: bytes.byteLength }, "Dropping frame: no daemon connection");
      },
      close: async () => {
        close();
      },
    },
    close,
  };
}

export async function connectGreetd(
  address: GreetdAddress,
  options: { logger: Logger; timeoutMs?: number }
): Promise<ConnectedTransport> {
  const description = formatDaemonAddress(address);
  const log = options.logger.child({ module: "transport", address: description });
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  const socket =
    address.kind === "unix"
      ? net.createConnection({ path: address.path })
      : net.createConnection({ host: address.host, port: address.port });

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError("unavailable", `Timed out connecting to ${description} after ${timeoutMs}ms`));
    }, timeoutMs);

    const onConnect = () => {
      cleanup();
      resolve();
    };
    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(
        new ConnectionError("unavailable", `Failed to connect to ${description}: ${error.message}`, {
          cause: error,
        })
      );
    };
    const cleanup = () => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onError);
    };

    socket.once("connect", onConnect);
    socket.once("error", onError);
  });

  // The read loop surfaces errors; this keeps an idle socket from crashing the process.
  socket.on("error", (error) => {
    log.debug({ err: error }, "Daemon socket error");
  });
  socket.once("close", () => {
    log.debug("Daemon socket closed");
  });
  log.info("Connected to greetd");

  return createStreamTransport({
    readable: socket,
    writable: socket,
    description,
    destroy: () => socket.destroy(),
  });
}

/**
 * Picks the transport variant once: a live connection, or (debug only) an
 * absent transport when the daemon cannot be reached.
 */
export async function openGreetdTransport(
  config: TransportOpenConfig,
  logger: Logger
): Promise<GreetdTransport> {
  try {
    const address = parseDaemonAddress(config.daemonSocket);
    return await connectGreetd(address, { logger, timeoutMs: config.connectTimeoutMs });
  } catch (error) {
    if (error instanceof ConnectionError && config.debug) {
      logger.warn(
        { err: error },
        `Error connecting to greetd: ${error.message} - running without connection`
      );
      return createAbsentTransport(error.message, logger);
    }
    throw error;
  }
}
