import { Command } from 'commander'
import chalk from 'chalk'
import { listDesktopSessions, type DesktopSession } from '@porch/greeter'
import { collectMultiple, loadCliContext } from '../utils/client.js'

export interface SessionsOptions {
  json?: boolean
  config?: string
  sessionDir?: string[]
}

export function formatSessionList(sessions: DesktopSession[], dirs: string[]): string[] {
  if (sessions.length === 0) {
    return [chalk.yellow(`No sessions found in ${dirs.join(', ')}`)]
  }

  const width = Math.max(...sessions.map((session) => session.id.length))
  return sessions.map((session) => {
    const id = chalk.bold(session.id.padEnd(width))
    const type = chalk.dim(`[${session.sessionType}]`)
    const comment = session.comment ? chalk.dim(` - ${session.comment}`) : ''
    return `${id}  ${session.name} ${type}${comment}`
  })
}

export function sessionsCommand(): Command {
  return new Command('sessions')
    .description('List desktop sessions available to "porch login"')
    .option('--json', 'Output in JSON format')
    .option('--config <path>', 'Config file (default: $PORCH_CONFIG or /etc/porch/config.json)')
    .option('--session-dir <path>', 'Directory of .desktop session files (can be used multiple times)', collectMultiple, [])
    .action(async (options: SessionsOptions) => {
      await runSessionsCommand(options)
    })
}

export async function runSessionsCommand(options: SessionsOptions): Promise<void> {
  const { config, logger } = loadCliContext(options)
  const sessions = await listDesktopSessions({ dirs: config.sessionDirs, logger })

  if (options.json) {
    console.log(JSON.stringify(sessions, null, 2))
    return
  }

  for (const line of formatSessionList(sessions, config.sessionDirs)) {
    console.log(line)
  }
}
