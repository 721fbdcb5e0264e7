import {
  GreeterClient,
  createRootLogger,
  loadConfig,
  loadPersistedConfig,
  openGreetdTransport,
  resolveConfigPath,
  type GreeterConfig,
} from '@porch/greeter'
import type { Logger } from 'pino'

export interface GreetdConnectOptions {
  socket?: string
  debug?: boolean
  config?: string
  sessionDir?: string[]
}

export interface CliContext {
  config: GreeterConfig
  logger: Logger
}

export interface GreetdContext extends CliContext {
  client: GreeterClient
}

// Collects a repeatable option into an array
export function collectMultiple(value: string, previous: string[]): string[] {
  return previous.concat([value])
}

/**
 * Resolve config and the root logger from CLI flags, the environment and the
 * config file, in that order of precedence.
 */
export function loadCliContext(
  options: GreetdConnectOptions,
  env: NodeJS.ProcessEnv = process.env
): CliContext {
  const persisted = loadPersistedConfig(resolveConfigPath(options.config, env))
  const config = loadConfig({
    env,
    persisted,
    overrides: {
      socket: options.socket,
      debug: options.debug,
      sessionDirs: options.sessionDir,
    },
  })
  return { config, logger: createRootLogger(config.log) }
}

/**
 * Open the greetd transport and start a client on it. Throws a
 * ConnectionError when greetd cannot be reached outside debug mode.
 */
export async function connectToGreetd(options: GreetdConnectOptions): Promise<GreetdContext> {
  const { config, logger } = loadCliContext(options)
  const transport = await openGreetdTransport(config, logger)
  const client = new GreeterClient({ transport, logger })
  client.start()
  return { config, logger, client }
}
