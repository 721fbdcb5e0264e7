import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";

export type SessionType = "wayland" | "x11" | "unknown";

export interface DesktopSession {
  /** File name without `.desktop`; also the value of XDG_SESSION_DESKTOP. */
  id: string;
  name: string;
  comment: string | null;
  command: string[];
  sessionType: SessionType;
  path: string;
}

export interface ListDesktopSessionsParams {
  dirs: string[];
  logger?: Logger;
}

const DEFAULT_XDG_DATA_DIRS = "/usr/local/share:/usr/share";
const DESKTOP_ENTRY_GROUP = "[Desktop Entry]";
const DESKTOP_SUFFIX = ".desktop";

// Deprecated codes included; all of them expand to nothing for a session.
const FIELD_CODE = /^%[fFuUdDnNickvm]$/;

const SESSION_TYPE_BY_DIR: Record<string, SessionType> = {
  "wayland-sessions": "wayland",
  xsessions: "x11",
};

export function defaultSessionDirs(env: NodeJS.ProcessEnv = process.env): string[] {
  const dataDirs = (env.XDG_DATA_DIRS?.trim() || DEFAULT_XDG_DATA_DIRS)
    .split(":")
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0);

  return [
    ...dataDirs.map((dir) => path.join(dir, "wayland-sessions")),
    ...dataDirs.map((dir) => path.join(dir, "xsessions")),
  ];
}

export function sessionTypeForDir(dir: string): SessionType {
  return SESSION_TYPE_BY_DIR[path.basename(dir)] ?? "unknown";
}

function unescapeValue(value: string): string {
  return value.replace(/\\([sntr\\])/g, (_match, code: string) => {
    switch (code) {
      case "s":
        return " ";
      case "n":
        return "\n";
      case "t":
        return "\t";
      case "r":
        return "\r";
      default:
        return "\\";
    }
  });
}

/**
 * Returns the keys of the `[Desktop Entry]` group. Localized keys (`Name[de]`)
 * are skipped; the first occurrence of a key wins.
 */
export function parseDesktopEntry(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  let inEntryGroup = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    if (line.startsWith("[")) {
      inEntryGroup = line === DESKTOP_ENTRY_GROUP;
      continue;
    }
    if (!inEntryGroup) continue;

    const separator = line.indexOf("=");
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim();
    if (key.includes("[") || entries.has(key)) continue;
    entries.set(key, unescapeValue(line.slice(separator + 1).trim()));
  }

  return entries;
}

/** Splits an `Exec` value into argv and drops field codes. */
export function splitExec(exec: string): string[] {
  const args: string[] = [];
  let current = "";
  let hasToken = false;
  let inQuotes = false;

  for (let i = 0; i < exec.length; i++) {
    const ch = exec[i];
    if (inQuotes) {
      const next = exec[i + 1];
      if (ch === "\\" && next !== undefined && '"`$\\'.includes(next)) {
        current += next;
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      hasToken = true;
    } else if (ch === " " || ch === "\t") {
      if (hasToken) {
        args.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += ch;
      hasToken = true;
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quote in Exec: ${exec}`);
  }
  if (hasToken) {
    args.push(current);
  }

  return args
    .filter((arg) => !FIELD_CODE.test(arg))
    .map((arg) => arg.replace(/%([%a-zA-Z])/g, (_match, code: string) => (code === "%" ? "%" : "")));
}

function isTrue(value: string | undefined): boolean {
  return value?.toLowerCase() === "true";
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toDesktopSession(params: {
  id: string;
  filePath: string;
  sessionType: SessionType;
  content: string;
}): DesktopSession | null {
  const entry = parseDesktopEntry(params.content);
  const type = entry.get("Type");
  if (type !== undefined && type !== "Application") return null;
  if (isTrue(entry.get("Hidden")) || isTrue(entry.get("NoDisplay"))) return null;

  const exec = entry.get("Exec");
  if (!exec) {
    throw new Error("missing Exec key");
  }
  const command = splitExec(exec);
  if (command.length === 0) {
    throw new Error("Exec is empty");
  }

  return {
    id: params.id,
    name: entry.get("Name") || params.id,
    comment: entry.get("Comment") || null,
    command,
    sessionType: params.sessionType,
    path: params.filePath,
  };
}

async function readSessionDir(dir: string, logger: Logger | undefined): Promise<string[]> {
  try {
    const names = await fs.readdir(dir);
    return names.filter((name) => name.endsWith(DESKTOP_SUFFIX)).sort();
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      logger?.debug({ dir }, "Session directory not found");
    } else {
      logger?.warn({ err: error, dir }, "Failed to read session directory");
    }
    return [];
  }
}

/**
 * Lists launchable sessions from the given directories in order. An id found
 * in an earlier directory shadows the same id later on, hidden or not.
 */
export async function listDesktopSessions({
  dirs,
  logger,
}: ListDesktopSessionsParams): Promise<DesktopSession[]> {
  const log = logger?.child({ module: "desktop-sessions" });
  const seen = new Set<string>();
  const sessions: DesktopSession[] = [];

  for (const dir of dirs) {
    const sessionType = sessionTypeForDir(dir);
    for (const fileName of await readSessionDir(dir, log)) {
      const id = fileName.slice(0, -DESKTOP_SUFFIX.length);
      if (seen.has(id)) continue;
      seen.add(id);

      const filePath = path.join(dir, fileName);
      try {
        const content = await fs.readFile(filePath, "utf-8");
        const session = toDesktopSession({ id, filePath, sessionType, content });
        if (session) {
          sessions.push(session);
        }
      } catch (error) {
        log?.warn({ err: error, path: filePath }, "Skipping invalid session entry");
      }
    }
  }

  return sessions;
}

/** Environment for start_session: session type and desktop id, then configured extras. */
export function sessionEnvironment(session: DesktopSession, extra: string[] = []): string[] {
  const env: string[] = [];
  if (session.sessionType !== "unknown") {
    env.push(`XDG_SESSION_TYPE=${session.sessionType}`);
  }
  env.push(`XDG_SESSION_DESKTOP=${session.id}`);
  return [...env, ...extra];
}
