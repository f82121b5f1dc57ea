import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import {InvalidArgumentError, type Command} from 'commander'
import pino from 'pino'
import {ExecaToolRunner} from '../engine/execa-runner.js'
import {droidsmithHome, loadConfig, resolveSettings} from '../core/config.js'
import type {PipelineDeps} from '../core/pipeline-run.js'
import {ConsoleReporter} from '../core/reporter.js'
import {SystemToolLocator} from '../core/tool-locator.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  home?: string;
  json?: boolean;
  verbose?: boolean;
  timeout?: number;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Loads config.yml from the home directory and wires the collaborators
 * every pipeline needs. Under --json, logs go to stderr and stdout carries
 * only the result document.
 */
export async function createDeps(cmd: Command): Promise<PipelineDeps & {json: boolean}> {
  const {home: homeOption, json = false, verbose, timeout} = getGlobalOptions(cmd)
  const home = homeOption ? resolve(homeOption) : droidsmithHome()
  const settings = resolveSettings(await loadConfig(home), {home, env: process.env})
  if (timeout !== undefined) {
    settings.toolTimeoutSec = timeout
  }

  return {
    runner: new ExecaToolRunner(),
    tools: new SystemToolLocator(settings),
    reporter: json
      ? new ConsoleReporter({level: verbose ? 'debug' : 'info', destination: pino.destination(2)})
      : new InteractiveReporter({verbose}),
    settings,
    json
  }
}

/**
 * Prints a command result: the JSON document under --json, the labelled
 * lines otherwise.
 */
export function printResult(json: boolean, result: unknown, lines: Array<[string, string | undefined]>): void {
  if (json) {
    console.log(JSON.stringify(result, null, 2))
    return
  }

  const width = Math.max(...lines.map(([label]) => label.length))
  for (const [label, value] of lines) {
    if (value !== undefined) {
      console.log(`  ${chalk.bold(`${label}:`.padEnd(width + 1))} ${value}`)
    }
  }
}

/** Parses a positive number option. */
export function parsePositive(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number, got: ${value}`)
  }

  return parsed
}

const sizeUnits = ['KB', 'MB', 'GB']

/** Human-readable size of an artifact on disk, in binary units. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  let value = bytes / 1024
  let unit = 0
  while (value >= 1024 && unit < sizeUnits.length - 1) {
    value /= 1024
    unit++
  }

  return `${value.toFixed(1)} ${sizeUnits[unit]}`
}

export function yesNo(value: boolean | undefined): string {
  if (value === undefined) {
    return chalk.gray('not checked')
  }

  return value ? chalk.green('yes') : chalk.red('no')
}
