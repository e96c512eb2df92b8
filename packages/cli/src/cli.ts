import { Command } from 'commander'
import { startCommand } from './commands/start.js'

const VERSION = '0.1.0'

export function createCli(): Command {
  const program = new Command()

  program
    .name('cipherpost-relay')
    .description('Relay server for end-to-end encrypted messaging')
    .version(VERSION, '-v, --version', 'output the version number')

  program.addCommand(startCommand())

  return program
}
