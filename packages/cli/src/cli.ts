import { Command } from 'commander'
import { createRequire } from 'node:module'
import { loginCommand } from './commands/login.js'
import { sessionsCommand } from './commands/sessions.js'

const require = createRequire(import.meta.url)

type CliPackageJson = {
  version?: unknown
}

function resolveCliVersion(): string {
  const packageJson: CliPackageJson = require('../package.json')
  if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
    return packageJson.version.trim()
  }
  throw new Error('Unable to resolve @porch/cli version from package.json.')
}

const VERSION = resolveCliVersion()

export function createCli(): Command {
  const program = new Command()

  program
    .name('porch')
    .description('porch - a command-line greeter for greetd')
    .version(VERSION, '-v, --version', 'output the version number')

  program.addCommand(loginCommand(), { isDefault: true })
  program.addCommand(sessionsCommand())

  return program
}
