import pino from "pino";
import { z } from "zod";
import type { PersistedConfig } from "./persisted-config.js";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
const LogFormatSchema = z.enum(["pretty", "json"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

// stdout belongs to the greeter UI.
const STDERR_FD = 2;

function fromEnv<T>(schema: z.ZodType<T>, value: string | undefined): T | undefined {
  const result = schema.safeParse(value?.trim().toLowerCase());
  return result.success ? result.data : undefined;
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = fromEnv(LogLevelSchema, env.PORCH_LOG);
  const envFormat = fromEnv(LogFormatSchema, env.PORCH_LOG_FORMAT);

  const level: LogLevel =
    envLevel ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    envFormat ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(config: ResolvedLogConfig): pino.Logger {
  if (config.format === "json") {
    return pino({ level: config.level }, pino.destination(STDERR_FD));
  }

  return pino({
    level: config.level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        singleLine: true,
        ignore: "pid,hostname",
        destination: STDERR_FD,
      },
    },
  });
}
