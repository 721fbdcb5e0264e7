import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

export const PORCH_CONFIG_ENV = "PORCH_CONFIG";
export const DEFAULT_CONFIG_PATH = "/etc/porch/config.json";

const LogConfigSchema = z
  .object({
    level: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

// KEY=VALUE, the shape greetd expects in start_session.env
const EnvEntrySchema = z
  .string()
  .regex(/^[^=\s]+=/, "expected KEY=VALUE");

export const PersistedConfigSchema = z
  .object({
    // v1 schema marker
    version: z.literal(1).optional(),

    daemon: z
      .object({
        socket: z.string().min(1).optional(),
        debug: z.boolean().optional(),
        connectTimeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    sessions: z
      .object({
        dirs: z.array(z.string().min(1)).optional(),
        env: z.array(EnvEntrySchema).optional(),
      })
      .strict()
      .optional(),

    log: LogConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

type LoggerLike = {
  child(bindings: Record<string, unknown>): LoggerLike;
  info(msg: string): void;
};

export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return explicit ?? env[PORCH_CONFIG_ENV] ?? DEFAULT_CONFIG_PATH;
}

/** Reads the JSON config file. A missing file is an empty config. */
export function loadPersistedConfig(configPath: string, logger?: LoggerLike): PersistedConfig {
  const log = logger?.child({ module: "config" });

  if (!existsSync(configPath)) {
    log?.info(`No config file at ${configPath}, using defaults`);
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to read ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${message}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[Config] Invalid config in ${configPath}:\n${issues}`);
  }

  log?.info(`Loaded from ${configPath}`);
  return result.data;
}
