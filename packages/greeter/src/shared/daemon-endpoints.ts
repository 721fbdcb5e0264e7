import { ConnectionError } from "./errors.js";

export type HostPortParts = {
  host: string;
  port: number;
  isIpv6: boolean;
};

export type GreetdAddress =
  | { kind: "unix"; path: string }
  | { kind: "tcp"; host: string; port: number; isIpv6: boolean };

export const GREETD_SOCKET_ENV = "GREETD_SOCK";

const UNIX_PREFIX = "unix:";

function parsePort(portStr: string, context: string): number {
  const port = Number(portStr);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`${context}: port must be between 1 and 65535`);
  }
  return port;
}

export function parseHostPort(input: string): HostPortParts {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new Error("Host is required");
  }

  // IPv6: [::1]:7000
  if (trimmed.startsWith("[")) {
    const match = trimmed.match(/^\[([^\]]+)\]:(\d{1,5})$/);
    if (!match) {
      throw new Error("Invalid host:port (expected [::1]:7000)");
    }
    const host = match[1].trim();
    if (!host) throw new Error("Host is required");
    const port = parsePort(match[2], "Invalid host:port");
    return { host, port, isIpv6: true };
  }

  const match = trimmed.match(/^(.+):(\d{1,5})$/);
  if (!match) {
    throw new Error("Invalid host:port (expected localhost:7000)");
  }
  const host = match[1].trim();
  if (!host) throw new Error("Host is required");
  const port = parsePort(match[2], "Invalid host:port");
  return { host, port, isIpv6: false };
}

/**
 * Resolves the daemon address handed over by the environment: a unix socket
 * path (optionally `unix:`-prefixed) or a `host:port` pair.
 */
export function parseDaemonAddress(raw: string | undefined | null): GreetdAddress {
  const trimmed = raw?.trim() ?? "";
  if (!trimmed) {
    throw new ConnectionError("unavailable", `${GREETD_SOCKET_ENV} is not set`);
  }

  if (trimmed.startsWith(UNIX_PREFIX)) {
    const path = trimmed.slice(UNIX_PREFIX.length).trim();
    if (!path) {
      throw new ConnectionError("unavailable", `Invalid daemon address "${trimmed}": empty socket path`);
    }
    return { kind: "unix", path };
  }

  if (trimmed.includes("/")) {
    return { kind: "unix", path: trimmed };
  }

  try {
    const { host, port, isIpv6 } = parseHostPort(trimmed);
    return { kind: "tcp", host, port, isIpv6 };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConnectionError("unavailable", `Invalid daemon address "${trimmed}": ${detail}`, {
      cause: error,
    });
  }
}

export function formatDaemonAddress(address: GreetdAddress): string {
  if (address.kind === "unix") {
    return address.path;
  }
  return address.isIpv6 ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}
