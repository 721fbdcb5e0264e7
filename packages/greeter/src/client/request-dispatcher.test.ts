import { describe, expect, test, vi } from "vitest";
import { ConnectionError } from "../shared/errors.js";
import { decodeRequestFrame } from "../shared/frame-codec.js";
import {
  cancelSessionRequest,
  createSessionRequest,
  postAuthMessageResponse,
} from "../shared/messages.js";
import { createSilentLogger } from "../test-utils/capturing-logger.js";
import type { ByteWriter } from "./greetd-transport.js";
import { RequestDispatcher } from "./request-dispatcher.js";

function createManualWriter() {
  const started: string[] = [];
  const pending: Array<{ resolve: () => void; reject: (error: Error) => void }> = [];
  let closed = false;
  const writer: ByteWriter = {
    get closed() {
      return closed;
    },
    write: (bytes) => {
      started.push(decodeRequestFrame(bytes).type);
      return new Promise<void>((resolve, reject) => pending.push({ resolve, reject }));
    },
    close: async () => {
      closed = true;
    },
  };
  return { writer, started, pending };
}

describe("RequestDispatcher", () => {
  test("writes one frame at a time in send order", async () => {
    const { writer, started, pending } = createManualWriter();
    const dispatcher = new RequestDispatcher(writer, createSilentLogger());

    const first = dispatcher.send(createSessionRequest("alice"));
    const second = dispatcher.send(postAuthMessageResponse("test-secret"));
    const third = dispatcher.send(cancelSessionRequest());
    expect(dispatcher.pendingWrites).toBe(3);

    await vi.waitFor(() => expect(started).toEqual(["create_session"]));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(started).toEqual(["create_session"]);

    pending[0].resolve();
    await first;
    await vi.waitFor(() =>
      expect(started).toEqual(["create_session", "post_auth_message_response"])
    );

    pending[1].resolve();
    await second;
    await vi.waitFor(() => expect(started).toHaveLength(3));
    expect(started[2]).toBe("cancel_session");

    pending[2].resolve();
    await third;
    await dispatcher.flushed();
    expect(dispatcher.pendingWrites).toBe(0);
  });

  test("fails every later send after a write error", async () => {
    const { writer, started, pending } = createManualWriter();
    const dispatcher = new RequestDispatcher(writer, createSilentLogger());

    const first = dispatcher.send(createSessionRequest("alice")).catch((error: unknown) => error);
    const queued = dispatcher
      .send(postAuthMessageResponse("test-secret"))
      .catch((error: unknown) => error);
    await vi.waitFor(() => expect(pending).toHaveLength(1));
    pending[0].reject(new Error("EPIPE"));

    const firstError = await first;
    expect(firstError).toBeInstanceOf(ConnectionError);
    expect(firstError instanceof Error && firstError.message).toBe("Write failed: EPIPE");
    const queuedError = await queued;
    expect(queuedError instanceof Error && queuedError.message).toBe(
      "Connection lost; request not sent"
    );
    expect(dispatcher.failed).toBe(true);

    await expect(dispatcher.send(cancelSessionRequest())).rejects.toBeInstanceOf(ConnectionError);
    expect(started).toEqual(["create_session"]);
  });

  test("keeps a ConnectionError from the writer as is", async () => {
    const lost = new ConnectionError("lost", "Connection to test is closed");
    const writer: ByteWriter = {
      closed: true,
      write: () => Promise.reject(lost),
      close: async () => {},
    };
    const dispatcher = new RequestDispatcher(writer, createSilentLogger());

    await expect(dispatcher.send(cancelSessionRequest())).rejects.toBe(lost);
  });

  test("close waits for queued writes before closing the writer", async () => {
    const { writer, pending } = createManualWriter();
    const dispatcher = new RequestDispatcher(writer, createSilentLogger());
    const sent = dispatcher.send(createSessionRequest("alice"));

    const closing = dispatcher.close();
    await vi.waitFor(() => expect(pending).toHaveLength(1));
    expect(writer.closed).toBe(false);

    pending[0].resolve();
    await sent;
    await closing;
    expect(writer.closed).toBe(true);
  });
});
