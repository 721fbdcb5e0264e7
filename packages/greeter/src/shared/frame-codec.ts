import { endianness } from "node:os";
import type { ZodType } from "zod";
import { ConnectionError, MalformedFrameError, ProtocolDecodeError } from "./errors.js";
import {
  GreetdRequestSchema,
  GreetdResponseSchema,
  toWireRequest,
  toWireResponse,
  type GreetdRequest,
  type GreetdResponse,
} from "./messages.js";

const LENGTH_PREFIX_SIZE = 4;
const UINT32_MAX = 0xffffffff;
const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

// greetd frames use the host's byte order, not network order.
const HOST_LITTLE_ENDIAN = endianness() === "LE";

export interface FrameDecoderOptions {
  maxFrameBytes?: number;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function asUint8Array(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") {
    return utf8Encoder.encode(data);
  }
  return null;
}

export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.byteLength > UINT32_MAX) {
    throw new MalformedFrameError(`Payload too large: ${payload.byteLength} bytes`);
  }
  const out = new Uint8Array(LENGTH_PREFIX_SIZE + payload.byteLength);
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint32(0, payload.byteLength, HOST_LITTLE_ENDIAN);
  out.set(payload, LENGTH_PREFIX_SIZE);
  return out;
}

export function readLengthPrefix(data: Uint8Array): number {
  if (data.byteLength < LENGTH_PREFIX_SIZE) {
    throw new MalformedFrameError(
      `Frame shorter than its length prefix (${data.byteLength} bytes)`
    );
  }
  const view = new DataView(data.buffer, data.byteOffset, LENGTH_PREFIX_SIZE);
  return view.getUint32(0, HOST_LITTLE_ENDIAN);
}

export function encodeRequest(request: GreetdRequest): Uint8Array {
  return encodeFrame(utf8Encoder.encode(JSON.stringify(toWireRequest(request))));
}

export function encodeResponse(response: GreetdResponse): Uint8Array {
  return encodeFrame(utf8Encoder.encode(JSON.stringify(toWireResponse(response))));
}

function decodePayload<T>(payload: Uint8Array, schema: ZodType<T>, label: string): T {
  let text: string;
  try {
    text = utf8Decoder.decode(payload);
  } catch (error) {
    throw new MalformedFrameError(`${label} payload is not valid UTF-8`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolDecodeError(`${label} payload is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolDecodeError(`Unrecognized ${label.toLowerCase()}: ${issues}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

export function decodeResponsePayload(payload: Uint8Array): GreetdResponse {
  return decodePayload(payload, GreetdResponseSchema, "Response");
}

export function decodeRequestPayload(payload: Uint8Array): GreetdRequest {
  return decodePayload(payload, GreetdRequestSchema, "Request");
}

function splitCompleteFrame(data: Uint8Array): Uint8Array {
  const length = readLengthPrefix(data);
  const expected = LENGTH_PREFIX_SIZE + length;
  if (data.byteLength < expected) {
    throw new MalformedFrameError(
      `Frame truncated: expected ${length} payload bytes, got ${data.byteLength - LENGTH_PREFIX_SIZE}`
    );
  }
  if (data.byteLength > expected) {
    throw new MalformedFrameError(
      `Frame carries ${data.byteLength - expected} trailing bytes`
    );
  }
  return data.subarray(LENGTH_PREFIX_SIZE);
}

/** Decodes exactly one contiguous response frame. */
export function decodeFrame(data: Uint8Array): GreetdResponse {
  return decodeResponsePayload(splitCompleteFrame(data));
}

export function decodeRequestFrame(data: Uint8Array): GreetdRequest {
  return decodeRequestPayload(splitCompleteFrame(data));
}

/**
 * Reassembles length-prefixed frames from arbitrarily sized chunks. Holds at
 * most one incomplete frame; everything completed by a chunk is returned.
 */
export class FrameDecoder<T = GreetdResponse> {
  private buffered: Uint8Array = new Uint8Array(0);
  private readonly maxFrameBytes: number;

  constructor(
    private readonly decodePayloadFn: (payload: Uint8Array) => T,
    options?: FrameDecoderOptions
  ) {
    this.maxFrameBytes = options?.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  get hasPartialFrame(): boolean {
    return this.buffered.byteLength > 0;
  }

  get bufferedBytes(): number {
    return this.buffered.byteLength;
  }

  push(chunk: Uint8Array): T[] {
    return Array.from(this.feed(chunk));
  }

  /** Like `push`, but hands out each frame as soon as it is complete. */
  *feed(chunk: Uint8Array): Generator<T, void, undefined> {
    if (chunk.byteLength === 0) {
      return;
    }
    this.append(chunk);

    while (this.buffered.byteLength >= LENGTH_PREFIX_SIZE) {
      const length = readLengthPrefix(this.buffered);
      if (length > this.maxFrameBytes) {
        this.reset();
        throw new MalformedFrameError(
          `Frame length ${length} exceeds limit of ${this.maxFrameBytes} bytes`
        );
      }
      const end = LENGTH_PREFIX_SIZE + length;
      if (this.buffered.byteLength < end) {
        return;
      }
      const payload = this.buffered.slice(LENGTH_PREFIX_SIZE, end);
      this.buffered = this.buffered.slice(end);
      yield this.decodePayloadFn(payload);
    }
  }

  reset(): void {
    this.buffered = new Uint8Array(0);
  }

  private append(chunk: Uint8Array): void {
    if (this.buffered.byteLength === 0) {
      // Copy: socket chunks may be Buffers sharing a pooled allocation.
      this.buffered = new Uint8Array(chunk);
      return;
    }
    const next = new Uint8Array(this.buffered.byteLength + chunk.byteLength);
    next.set(this.buffered, 0);
    next.set(chunk, this.buffered.byteLength);
    this.buffered = next;
  }
}

export function createResponseDecoder(options?: FrameDecoderOptions): FrameDecoder<GreetdResponse> {
  return new FrameDecoder(decodeResponsePayload, options);
}

export function createRequestDecoder(options?: FrameDecoderOptions): FrameDecoder<GreetdRequest> {
  return new FrameDecoder(decodeRequestPayload, options);
}

/**
 * Yields every response frame read from `source`. Ends with the stream; a
 * stream that stops inside a frame is a lost connection.
 */
export async function* decodeFrames(
  source: AsyncIterable<Uint8Array>,
  options?: FrameDecoderOptions
): AsyncGenerator<GreetdResponse, void, undefined> {
  const decoder = createResponseDecoder(options);
  for await (const chunk of source) {
    for (const response of decoder.feed(chunk)) {
      yield response;
    }
  }
  if (decoder.hasPartialFrame) {
    throw new ConnectionError(
      "lost",
      `Stream ended inside a frame (${decoder.bufferedBytes} bytes buffered)`
    );
  }
}
