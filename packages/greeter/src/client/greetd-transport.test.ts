import net from "node:net";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm } from "node:fs/promises";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, test } from "vitest";
import { ConnectionError } from "../shared/errors.js";
import {
  createRequestDecoder,
  decodeFrames,
  encodeRequest,
  encodeResponse,
} from "../shared/frame-codec.js";
import { createSessionRequest, type GreetdRequest } from "../shared/messages.js";
import { createSilentLogger } from "../test-utils/capturing-logger.js";
import {
  connectGreetd,
  createAbsentTransport,
  createStreamTransport,
  openGreetdTransport,
} from "./greetd-transport.js";

const logger = createSilentLogger();

async function firstChunk(source: AsyncIterable<Uint8Array>): Promise<Uint8Array | null> {
  for await (const chunk of source) {
    return chunk;
  }
  return null;
}

describe("createStreamTransport", () => {
  test("writes to the writable half and reads from the readable half", async () => {
    const inbound = new PassThrough();
    const outbound = new PassThrough();
    const transport = createStreamTransport({ readable: inbound, writable: outbound, description: "test" });

    await transport.writer.write(new Uint8Array([1, 2, 3]));
    expect(Array.from(outbound.read())).toEqual([1, 2, 3]);

    inbound.write(Buffer.from([9, 8]));
    const chunk = await firstChunk(transport.reader.chunks());
    expect(chunk && Array.from(chunk)).toEqual([9, 8]);
  });

  test("gives the read half to a single owner", () => {
    const transport = createStreamTransport({
      readable: new PassThrough(),
      writable: new PassThrough(),
      description: "test",
    });
    transport.reader.chunks();
    expect(() => transport.reader.chunks()).toThrow("Transport read half already has an owner");
  });

  test("rejects writes once the stream is closed", async () => {
    const outbound = new PassThrough();
    const transport = createStreamTransport({
      readable: new PassThrough(),
      writable: outbound,
      description: "test",
    });
    await transport.writer.close();
    expect(transport.writer.closed).toBe(true);

    await expect(transport.writer.write(new Uint8Array([1]))).rejects.toThrow(
      new ConnectionError("lost", "Connection to test is closed")
    );
  });

  test("wraps read errors as a lost connection", async () => {
    const inbound = new PassThrough();
    const transport = createStreamTransport({
      readable: inbound,
      writable: new PassThrough(),
      description: "test",
    });
    const reading = firstChunk(transport.reader.chunks());
    inbound.destroy(new Error("ECONNRESET"));

    await expect(reading).rejects.toThrow("Read from test failed: ECONNRESET");
  });
});

describe("createAbsentTransport", () => {
  test("drops writes and reads nothing until closed", async () => {
    const transport = createAbsentTransport("GREETD_SOCK is not set", logger);
    expect(transport.kind).toBe("absent");
    expect(transport.description).toBe("no daemon");

    await expect(transport.writer.write(encodeRequest(createSessionRequest("alice")))).resolves.toBeUndefined();

    const reading = firstChunk(transport.reader.chunks());
    transport.close();
    await expect(reading).resolves.toBeNull();
    expect(transport.writer.closed).toBe(true);
  });
});

describe("connectGreetd", () => {
  let tempDir: string | null = null;
  let server: net.Server | null = null;

  afterEach(async () => {
    if (server) {
      const closing = server;
      await new Promise<void>((resolve) => closing.close(() => resolve()));
      server = null;
    }
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  test("exchanges frames over a unix socket", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "porch-transport-"));
    const socketPath = path.join(tempDir, "greetd.sock");
    const received: GreetdRequest[] = [];

    const listening = net.createServer((socket) => {
      const decoder = createRequestDecoder();
      socket.on("data", (chunk: Buffer) => {
        for (const request of decoder.push(chunk)) {
          received.push(request);
          socket.write(encodeResponse({ type: "success" }));
        }
      });
    });
    server = listening;
    await new Promise<void>((resolve) => listening.listen(socketPath, resolve));

    const transport = await connectGreetd({ kind: "unix", path: socketPath }, { logger });
    expect(transport.kind).toBe("connected");
    expect(transport.description).toBe(socketPath);

    await transport.writer.write(encodeRequest(createSessionRequest("alice")));
    const responses = decodeFrames(transport.reader.chunks())[Symbol.asyncIterator]();
    await expect(responses.next()).resolves.toEqual({ value: { type: "success" }, done: false });
    expect(received).toEqual([{ type: "create_session", username: "alice" }]);

    transport.close();
  });

  test("reports a missing socket as unavailable", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "porch-transport-"));
    const socketPath = path.join(tempDir, "missing.sock");

    const error = await connectGreetd({ kind: "unix", path: socketPath }, { logger }).catch(
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.reason).toBe("unavailable");
    expect(error instanceof Error && error.message.startsWith(`Failed to connect to ${socketPath}:`)).toBe(
      true
    );
  });
});

describe("openGreetdTransport", () => {
  test("falls back to an absent transport only in debug mode", async () => {
    const transport = await openGreetdTransport(
      { daemonSocket: null, debug: true, connectTimeoutMs: 100 },
      logger
    );
    expect(transport.kind === "absent" && transport.reason).toBe("GREETD_SOCK is not set");
    transport.close();
  });

  test("propagates the connection error otherwise", async () => {
    await expect(
      openGreetdTransport({ daemonSocket: null, debug: false, connectTimeoutMs: 100 }, logger)
    ).rejects.toThrow("GREETD_SOCK is not set");
  });
});
