import { Command } from 'commander'
import { cancel, intro, isCancel, log, outro, password, select, text } from '@clack/prompts'
import {
  listDesktopSessions,
  sessionEnvironment,
  splitExec,
  type AuthNotice,
  type AuthPhase,
  type AuthPrompt,
  type DesktopSession,
  type GreeterClient,
} from '@porch/greeter'
import { collectMultiple, connectToGreetd, type GreetdConnectOptions } from '../utils/client.js'

export const EXIT_UNREACHABLE = 1
export const EXIT_CANCELLED = 130

export class LoginCancelledError extends Error {
  constructor(message = 'Login cancelled') {
    super(message)
    this.name = 'LoginCancelledError'
  }
}

/**
 * Everything the login flow asks of the terminal. Implementations throw
 * LoginCancelledError when the user backs out of a prompt.
 */
export interface LoginPrompter {
  askUsername(): Promise<string>
  askAuthValue(prompt: AuthPrompt): Promise<string>
  selectSession(sessions: DesktopSession[]): Promise<DesktopSession>
  notice(notice: AuthNotice): void
  error(message: string): void
}

export type LoginOutcome =
  | { status: 'started'; username: string; command: string[] }
  | { status: 'unreachable'; reason: string }
  | { status: 'cancelled' }

export interface LoginFlowOptions {
  client: GreeterClient
  prompter: LoginPrompter
  sessions: DesktopSession[]
  /** Skips the first username prompt. */
  username?: string
  sessionId?: string
  /** Raw Exec-style command line; wins over sessionId. */
  command?: string
  sessionEnv?: string[]
  /** Limit on each wait for greetd; 0, the default, waits as long as greetd takes. */
  responseTimeoutMs?: number
}

type SessionLaunch = { command: string[]; env: string[] }

type AuthResult = Extract<AuthPhase, { status: 'ready_to_start_session' | 'failed' }>

export async function runLoginFlow(options: LoginFlowOptions): Promise<LoginOutcome> {
  const { client, prompter } = options
  const timeoutMs = options.responseTimeoutMs ?? 0
  const pickLaunch = createLaunchResolver(options)

  const unsubscribe = client.subscribe((event) => {
    if (event.type === 'notice') {
      prompter.notice(event.notice)
    }
  })

  let presetUsername = options.username?.trim() || undefined

  try {
    while (true) {
      const username = presetUsername ?? (await prompter.askUsername())
      presetUsername = undefined

      client.beginLogin(username)
      const result = await authenticate(client, prompter, timeoutMs)
      if (result.status === 'failed') {
        if (result.cause === 'connection' || result.cause === 'protocol') {
          return { status: 'unreachable', reason: result.reason }
        }
        prompter.error(result.reason)
        continue
      }

      const launch = await pickLaunch(prompter)
      client.chooseSession(launch.command, launch.env)
      const final = await client.waitForPhase(
        (phase) => phase.status === 'session_started' || phase.status === 'failed',
        { timeoutMs }
      )
      if (final.status === 'failed') {
        if (final.cause === 'connection' || final.cause === 'protocol') {
          return { status: 'unreachable', reason: final.reason }
        }
        prompter.error(final.reason)
        continue
      }

      return { status: 'started', username, command: launch.command }
    }
  } catch (error) {
    if (error instanceof LoginCancelledError) {
      abandonAttempt(client)
      return { status: 'cancelled' }
    }
    throw error
  } finally {
    unsubscribe()
  }
}

async function authenticate(
  client: GreeterClient,
  prompter: LoginPrompter,
  timeoutMs: number
): Promise<AuthResult> {
  while (true) {
    const phase = await client.waitForPhase(
      (candidate) =>
        candidate.status === 'awaiting_auth_response' ||
        candidate.status === 'ready_to_start_session' ||
        candidate.status === 'failed',
      { timeoutMs }
    )
    if (phase.status === 'ready_to_start_session' || phase.status === 'failed') {
      return phase
    }
    if (phase.status !== 'awaiting_auth_response') {
      continue
    }
    const value = await prompter.askAuthValue(phase.prompt)
    client.supplyAuthValue(value)
  }
}

function abandonAttempt(client: GreeterClient): void {
  const phase = client.getPhase()
  if (phase.status === 'idle' || phase.status === 'failed' || phase.status === 'session_started') {
    return
  }
  client.cancel()
}

function createLaunchResolver(
  options: LoginFlowOptions
): (prompter: LoginPrompter) => Promise<SessionLaunch> {
  const extraEnv = options.sessionEnv ?? []

  if (options.command?.trim()) {
    // Parse up front so a bad --cmd fails before anyone types a password.
    const command = splitExec(options.command.trim())
    return async () => ({ command, env: [...extraEnv] })
  }

  if (options.sessionId) {
    const session = options.sessions.find((candidate) => candidate.id === options.sessionId)
    if (!session) {
      throw new Error(`Unknown session: ${options.sessionId}`)
    }
    return async () => ({ command: session.command, env: sessionEnvironment(session, extraEnv) })
  }

  if (options.sessions.length === 0) {
    throw new Error('No sessions found; pass --cmd to choose a command')
  }

  return async (prompter) => {
    const session =
      options.sessions.length === 1 ? options.sessions[0] : await prompter.selectSession(options.sessions)
    return { command: session.command, env: sessionEnvironment(session, extraEnv) }
  }
}

// ============================================================================
// Terminal prompter
// ============================================================================

function unlessCancelled<T>(value: T | symbol): T {
  if (isCancel(value)) {
    throw new LoginCancelledError()
  }
  return value
}

export function createClackPrompter(): LoginPrompter {
  return {
    async askUsername() {
      const answer = await text({
        message: 'Username',
        validate: (value) => (value.trim() ? undefined : 'Username is required'),
      })
      return unlessCancelled(answer).trim()
    },

    async askAuthValue(prompt) {
      const answer =
        prompt.kind === 'secret'
          ? await password({ message: prompt.message })
          : await text({ message: prompt.message })
      return unlessCancelled(answer)
    },

    async selectSession(sessions) {
      const answer = await select({
        message: 'Session',
        options: sessions.map((session) => ({
          value: session.id,
          label: session.name,
          hint: session.comment ?? session.sessionType,
        })),
      })
      const id = unlessCancelled(answer)
      const session = sessions.find((candidate) => candidate.id === id)
      if (!session) {
        throw new Error(`Unknown session: ${id}`)
      }
      return session
    },

    notice(notice) {
      if (notice.kind === 'error') {
        log.error(notice.message)
      } else {
        log.info(notice.message)
      }
    },

    error(message) {
      log.error(message)
    },
  }
}

// ============================================================================
// Command
// ============================================================================

export interface LoginOptions extends GreetdConnectOptions {
  user?: string
  session?: string
  cmd?: string
}

export function loginCommand(): Command {
  return new Command('login')
    .description('Log in through greetd and start a session')
    .option('-u, --user <name>', 'Username to log in as (prompted when omitted)')
    .option('-s, --session <id>', 'Desktop session id, as listed by "porch sessions"')
    .option('--cmd <command>', 'Start this command instead of a desktop session')
    .option('--socket <path>', 'greetd socket (default: $GREETD_SOCK)')
    .option('--debug', 'Keep running without a greetd connection')
    .option('--config <path>', 'Config file (default: $PORCH_CONFIG or /etc/porch/config.json)')
    .option('--session-dir <path>', 'Directory of .desktop session files (can be used multiple times)', collectMultiple, [])
    .action(async (options: LoginOptions) => {
      await runLogin(options)
    })
}

export async function runLogin(options: LoginOptions): Promise<void> {
  intro('porch')

  const { client, config, logger } = await connectToGreetd(options).catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    cancel(message)
    process.exit(EXIT_UNREACHABLE)
  })

  const connection = client.getConnectionState()
  if (connection.status === 'absent') {
    log.warn(`Running without greetd (${connection.reason}); nothing will be sent`)
  }

  let outcome: LoginOutcome
  try {
    const sessions = await listDesktopSessions({ dirs: config.sessionDirs, logger })
    outcome = await runLoginFlow({
      client,
      prompter: createClackPrompter(),
      sessions,
      username: options.user,
      sessionId: options.session,
      command: options.cmd,
      sessionEnv: config.sessionEnv,
    })
  } catch (error) {
    await client.close()
    const message = error instanceof Error ? error.message : String(error)
    cancel(message)
    process.exit(EXIT_UNREACHABLE)
  }

  await client.close()

  switch (outcome.status) {
    case 'started':
      outro(`Starting session for ${outcome.username}: ${outcome.command.join(' ')}`)
      return
    case 'unreachable':
      cancel(outcome.reason)
      process.exit(EXIT_UNREACHABLE)
    case 'cancelled':
      cancel('Login cancelled')
      process.exit(EXIT_CANCELLED)
  }
}
