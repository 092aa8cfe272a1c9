import { Command, InvalidArgumentError, Option } from 'commander'
import { LOG_LEVELS, describeError, reportableStack, type LogLevel } from '@pagewatch/server'
import { buildCommand, serveCommand, type BuildOptions, type ServeOptions } from './commands/index.js'

export interface CommandHandlers {
  serve(options: ServeOptions): Promise<void>
  build(options: BuildOptions): Promise<void>
}

const defaultHandlers: CommandHandlers = {
  serve: serveCommand,
  build: buildCommand,
}

/**
 * Print a command failure. Expected failures print their message and cause
 * chain; anything else also prints its stack.
 */
export function reportFailure(error: unknown, sink: Pick<Console, 'error'> = console): void {
  sink.error(`❌ ${describeError(error)}`)
  const stack = reportableStack(error)
  if (stack) {
    sink.error(stack)
  }
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port number.')
  }
  return port
}

function logLevelOption(): Option {
  return new Option('--log-level <level>', 'Minimum level of log output')
    .choices(LOG_LEVELS)
    .env('PAGEWATCH_LOG')
    .default('info')
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command()

  program
    .name('pagewatch')
    .description('Build a book, serve it and reload the browser on every change')
    .version('0.1.0')

  // Serve command
  program
    .command('serve')
    .description('Serve the book at http://localhost:3000 and rebuild it on changes')
    .argument('[dir]', 'Root directory for the book', '.')
    .option('-d, --dest-dir <dir>', 'Output directory for the book, relative to its root')
    .option('-n, --hostname <hostname>', 'Hostname to listen on for HTTP connections', 'localhost')
    .option('-p, --port <port>', 'Port to use for HTTP connections', parsePort, 3000)
    .option('-o, --open', 'Open the book in a browser after the initial build')
    .option('-l, --language <language>', 'Language of the book to serve')
    .addOption(logLevelOption())
    .action(
      async (
        dir: string,
        options: { destDir?: string; hostname: string; port: number; open?: boolean; language?: string; logLevel: LogLevel }
      ) => {
        await handlers.serve({ dir, ...options })
      }
    )

  // Build command
  program
    .command('build')
    .description('Build the book once')
    .argument('[dir]', 'Root directory for the book', '.')
    .option('-d, --dest-dir <dir>', 'Output directory for the book, relative to its root')
    .option('-l, --language <language>', 'Language of the book to build')
    .addOption(logLevelOption())
    .action(async (dir: string, options: { destDir?: string; language?: string; logLevel: LogLevel }) => {
      await handlers.build({ dir, ...options })
    })

  return program
}
