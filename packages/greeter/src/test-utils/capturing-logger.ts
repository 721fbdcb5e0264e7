import pino from "pino";
import { Writable } from "node:stream";

export type CapturedLogEntry = {
  level: number;
  msg: string;
  module: string | null;
};

function toEntry(line: string): CapturedLogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;
  const level = "level" in parsed && typeof parsed.level === "number" ? parsed.level : 0;
  const msg = "msg" in parsed && typeof parsed.msg === "string" ? parsed.msg : "";
  const module = "module" in parsed && typeof parsed.module === "string" ? parsed.module : null;
  return { level, msg, module };
}

export function createCapturingLogger(level: pino.LevelWithSilent = "debug") {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _enc, cb) {
      lines.push(chunk.toString("utf8"));
      cb();
    },
  });
  const logger = pino({ level }, stream);

  const entries = (): CapturedLogEntry[] =>
    lines.map(toEntry).filter((entry): entry is CapturedLogEntry => entry !== null);

  return {
    logger,
    lines,
    entries,
    messages: (): string[] => entries().map((entry) => entry.msg),
  };
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
