#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {DroidsmithError} from '../errors.js'
import {registerAnalyzeCommand} from './commands/analyze.js'
import {registerBuildCommand} from './commands/build.js'
import {registerDecompileCommand} from './commands/decompile.js'
import {registerDumpCommand} from './commands/dump.js'
import {registerInstrumentCommand} from './commands/instrument.js'
import {registerMergeCommand} from './commands/merge.js'
import {parsePositive} from './utils.js'

function printError(error: DroidsmithError): void {
  console.error(chalk.red(`Error [${error.code}]: ${error.message}`))
  let cause = error.cause
  while (cause instanceof Error) {
    if (!error.message.includes(cause.message)) {
      console.error(chalk.gray(`  caused by: ${cause.message}`))
    }

    cause = cause.cause
  }
}

async function main() {
  const program = new Command()

  program
    .name('droidsmith')
    .description('Rebuild, sign, decompile, merge, instrument and analyze Android APKs')
    .version('0.1.0')
    .option('--home <dir>', 'Settings directory holding config.yml and the debug keystore (default: $DROIDSMITH_HOME or ~/.droidsmith)')
    .option('--json', 'Output structured JSON logs and results')
    .option('--verbose', 'Stream tool output')
    .option('--timeout <seconds>', 'Timeout for each external tool', parsePositive)

  registerBuildCommand(program)
  registerDecompileCommand(program)
  registerMergeCommand(program)
  registerInstrumentCommand(program)
  registerDumpCommand(program)
  registerAnalyzeCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof DroidsmithError) {
    printError(error)
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
