#!/usr/bin/env node
import { CommanderError } from 'commander'
import kleur from 'kleur'
import { loadConfig } from './config.js'
import { ListenError, describeError } from './errors.js'
import { createProgram } from './program.js'
import { runListen } from './supervisor.js'

function reportFatal(err: unknown): number {
  if (err instanceof CommanderError) {
    // commander has already printed usage or the parse error
    return err.exitCode === 0 ? 0 : 2
  }
  if (err instanceof ListenError) {
    console.error(kleur.red(`ERROR: ${err.message}`))
    if (err.hint) console.error(err.hint)
    return err.exitCode
  }
  console.error(kleur.red(`ERROR: ${describeError(err)}`))
  return 1
}

const program = createProgram(async (input, overrides) => {
  const config = await loadConfig(overrides)
  process.exitCode = await runListen(input, config)
})

program.parseAsync(process.argv)
  .catch(err => {
    process.exitCode = reportFatal(err)
  })
  .finally(() => process.exit())
