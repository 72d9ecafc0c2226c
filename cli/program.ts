import { Command, InvalidArgumentError, Option } from 'commander'
import { CLIENT_VERSION, type ConfigOverrides } from './config.js'
import type { ListenInput } from './supervisor.js'
import { OUTPUT_MODES } from '../src/views/types.js'

export type ListenAction = (input: ListenInput, overrides: ConfigOverrides) => Promise<void>

interface ListenFlags {
  path?: string
  output?: string
  timeout?: number
  maxBody?: number
  concurrency?: number
  drainTimeout?: number
  insecure?: boolean
  verbose?: boolean
  wsBase?: string
  wss: boolean
}

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10)
  if (!/^\d+$/.test(value.trim()) || isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

export function createProgram(action: ListenAction): Command {
  const program = new Command()
  program
    .name('hookrelay')
    .description('Forward webhook deliveries to a server on this machine')
    .version(CLIENT_VERSION)
    .exitOverride()

  program
    .command('listen')
    .description('Receive events from one or more sources and replay them against a local server')
    .argument('<port-or-url>', 'local port, or http(s) URL, to forward to')
    .argument('[source-query]', 'source name, comma-separated list of names, or "*" for all sources')
    .argument('[connection-filter]', 'connection name or CLI path to use')
    .option('--path <path>', 'path prefix appended to the target path')
    .addOption(new Option('--output <mode>', 'output mode').choices(OUTPUT_MODES))
    .option('--timeout <ms>', 'per-attempt timeout', positiveInt)
    .option('--max-body <bytes>', 'response body capture limit', positiveInt)
    .option('--concurrency <n>', 'deliveries dispatched at once', positiveInt)
    .option('--drain-timeout <ms>', 'time given to in-flight deliveries on shutdown', positiveInt)
    .option('--insecure', 'accept self-signed certificates from an https target')
    .option('--verbose', 'debug logging')
    .addOption(new Option('--ws-base <url>', 'override the transport endpoint').hideHelp())
    .addOption(new Option('--no-wss', 'use ws:// instead of wss://').hideHelp())
    .action(async (target: string, sourceQuery: string | undefined, connectionFilter: string | undefined, flags: ListenFlags) => {
      await action(
        { target, sourceQuery, connectionFilter, path: flags.path, output: flags.output },
        {
          timeoutMs: flags.timeout,
          maxBodyBytes: flags.maxBody,
          concurrency: flags.concurrency,
          drainMs: flags.drainTimeout,
          insecure: flags.insecure,
          verbose: flags.verbose,
          wsBaseOverride: flags.wsBase,
          noWss: !flags.wss,
        },
      )
    })

  return program
}
