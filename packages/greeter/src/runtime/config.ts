import { GREETD_SOCKET_ENV } from "../shared/daemon-endpoints.js";
import { defaultSessionDirs } from "../sessions/desktop-sessions.js";
import { resolveLogConfig, type ResolvedLogConfig } from "./logger.js";
import type { PersistedConfig } from "./persisted-config.js";

export const PORCH_DEBUG_ENV = "PORCH_DEBUG";

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export interface GreeterConfig {
  daemonSocket: string | null;
  /** Allows running without a daemon connection. */
  debug: boolean;
  connectTimeoutMs: number;
  sessionDirs: string[];
  sessionEnv: string[];
  log: ResolvedLogConfig;
}

export interface CliConfigOverrides {
  socket?: string;
  debug?: boolean;
  sessionDirs?: string[];
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseBooleanFlag(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

/** CLI overrides win over the environment, which wins over the config file. */
export function loadConfig(params: {
  env?: NodeJS.ProcessEnv;
  persisted?: PersistedConfig;
  overrides?: CliConfigOverrides;
}): GreeterConfig {
  const env = params.env ?? process.env;
  const persisted = params.persisted ?? {};
  const overrides = params.overrides ?? {};

  const daemonSocket =
    nonEmpty(overrides.socket) ??
    nonEmpty(env[GREETD_SOCKET_ENV]) ??
    nonEmpty(persisted.daemon?.socket) ??
    null;

  const debug =
    overrides.debug ??
    parseBooleanFlag(env[PORCH_DEBUG_ENV]) ??
    persisted.daemon?.debug ??
    false;

  const sessionDirs =
    overrides.sessionDirs && overrides.sessionDirs.length > 0
      ? [...overrides.sessionDirs]
      : persisted.sessions?.dirs ?? defaultSessionDirs(env);

  return {
    daemonSocket,
    debug,
    connectTimeoutMs: persisted.daemon?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    sessionDirs,
    sessionEnv: persisted.sessions?.env ?? [],
    log: resolveLogConfig(persisted, env),
  };
}
