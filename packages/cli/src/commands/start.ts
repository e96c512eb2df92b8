import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import type { Logger } from 'pino'
import {
  createRelayDaemon,
  createRootLogger,
  loadConfig,
  loadPersistedConfig,
  readCipherpostHomeFromEnv,
  type CliConfigOverrides,
  type RelayDaemon,
} from '@cipherpost/server'
import { getErrorMessage } from '../utils/errors.js'

export interface StartOptions {
  port?: number
  host?: string
  path?: string
  home?: string
  heartbeatInterval?: number
  heartbeatTimeout?: number
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

export function parsePositiveIntegerOption(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

export function parsePathOption(value: string): string {
  if (!value.startsWith('/')) {
    throw new InvalidArgumentError('Path must start with "/".')
  }
  return value
}

export function toConfigOverrides(options: StartOptions): CliConfigOverrides {
  return {
    host: options.host,
    port: options.port,
    path: options.path,
    heartbeatIntervalMs: options.heartbeatInterval,
    heartbeatTimeoutMs: options.heartbeatTimeout,
  }
}

export function startCommand(): Command {
  return new Command('start')
    .description('Start the relay server in the foreground')
    .option('--port <port>', 'Port to listen on (default: 8765)', parseIntegerOption)
    .option('--host <host>', 'Interface to bind (default: 0.0.0.0)')
    .option('--path <path>', 'Only accept WebSocket upgrades on this path', parsePathOption)
    .option('--home <path>', 'Cipherpost home directory (default: ~/.cipherpost)')
    .option('--heartbeat-interval <ms>', 'Liveness probe interval in milliseconds', parsePositiveIntegerOption)
    .option('--heartbeat-timeout <ms>', 'Drop sessions silent for longer than this', parsePositiveIntegerOption)
    .action(async (options: StartOptions) => {
      await runStart(options)
    })
}

function prepareDaemon(options: StartOptions): { daemon: RelayDaemon; logger: Logger } {
  if (options.home) {
    process.env.CIPHERPOST_HOME = options.home
  }

  const home = readCipherpostHomeFromEnv()
  const persistedConfig = loadPersistedConfig(home)
  const logger = createRootLogger(persistedConfig)
  const config = loadConfig(home, { overrides: toConfigOverrides(options) })
  return { daemon: createRelayDaemon(config, logger), logger }
}

async function runStart(options: StartOptions): Promise<void> {
  let prepared: { daemon: RelayDaemon; logger: Logger }
  try {
    prepared = prepareDaemon(options)
  } catch (err) {
    console.error(chalk.red(`Invalid configuration: ${getErrorMessage(err)}`))
    process.exit(1)
  }

  const { daemon, logger } = prepared
  let shuttingDown = false
  const handleShutdown = async (signal: string) => {
    if (shuttingDown) {
      logger.info('Forcing exit...')
      process.exit(1)
    }
    shuttingDown = true
    logger.info(`${signal} received, shutting down gracefully... (press Ctrl+C again to force exit)`)

    const forceExit = setTimeout(() => {
      logger.warn('Forcing shutdown - relay didn\'t close in time')
      process.exit(1)
    }, 10000)

    try {
      await daemon.close()
      clearTimeout(forceExit)
      logger.info('Relay closed')
      process.exit(0)
    } catch (err) {
      clearTimeout(forceExit)
      logger.error({ err }, 'Shutdown failed')
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void handleShutdown('SIGTERM'))
  process.on('SIGINT', () => void handleShutdown('SIGINT'))

  try {
    await daemon.start()
  } catch (err) {
    console.error(chalk.red(`Failed to start relay: ${getErrorMessage(err)}`))
    process.exit(1)
  }
}
