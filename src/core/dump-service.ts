import process from 'node:process'
import {mkdir, writeFile} from 'node:fs/promises'
import {basename, dirname, extname, join, resolve} from 'node:path'
import {DumpError, ValidationError} from '../errors.js'
import type {DumpResult} from '../types.js'
import {AdbCommands} from './adb.js'
import {PipelineRun, type PipelineDeps} from './pipeline-run.js'

export type DumpOptions = {
  packageName: string;
  /** Raw dump path (default `<outputDir>/<package>_dump.dart`) */
  outputPath?: string;
  /** Directory of the default output path (default current directory) */
  outputDir?: string;
  deviceId?: string;
  /** Check for a root shell before reading (default true) */
  checkRoot?: boolean;
  /** Also write an indented JSON copy when the dump is JSON (default true) */
  format?: boolean;
  timeoutSec?: number;
}

const stages = {
  root: {id: 'root-check', displayName: 'Check root access'},
  read: {id: 'read-dump', displayName: 'Read runtime dump'},
  save: {id: 'save-dump', displayName: 'Save runtime dump'}
}

const packageNamePattern = /^[A-Za-z]\w*(\.[A-Za-z]\w*)+$/

/**
 * @throws {ValidationError} If the value is not a dotted Java package name
 */
export function assertPackageName(value: string): string {
  if (!packageNamePattern.test(value)) {
    throw new ValidationError(`Invalid package name: ${value}`)
  }

  return value
}

export function defaultDumpOutput(packageName: string, outputDir = process.cwd()): string {
  return join(resolve(outputDir), `${packageName}_dump.dart`)
}

/**
 * Path of the JSON copy: the dump path with a `.json` extension, or with
 * `.formatted.json` when the dump itself is named `.json`.
 */
export function jsonCopyPath(dumpPath: string): string {
  const extension = extname(dumpPath)
  const suffix = extension.toLowerCase() === '.json' ? '.formatted.json' : '.json'
  return join(dirname(dumpPath), `${basename(dumpPath, extension)}${suffix}`)
}

/**
 * Re-indents a JSON document, or returns undefined when the text is not JSON.
 */
export function formatJson(content: string): string | undefined {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch {
    return undefined
  }

  return JSON.stringify(data, null, 2)
}

/**
 * Reads the runtime dump an instrumented app writes in its private data
 * directory.
 *
 * Empty content is reported apart from a failed read: it means the app has
 * not run since it was installed.
 */
export class DumpService {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * @throws {DumpError} With reason `root-required`, `read-failed` or `empty`
   */
  async dump(options: DumpOptions): Promise<DumpResult> {
    const run = PipelineRun.start(this.deps.reporter, 'dump', options.packageName)
    return run.complete(async () => this.execute(run, options), result => result.dumpPath)
  }

  async execute(run: PipelineRun, options: DumpOptions): Promise<DumpResult> {
    const packageName = assertPackageName(options.packageName)
    const {checkRoot = true, format = true} = options
    const dumpPath = resolve(options.outputPath ?? defaultDumpOutput(packageName, options.outputDir))
    const devicePath = this.deps.settings.instrumentation.deviceDumpPath.replaceAll('{package}', packageName)
    const adb = new AdbCommands(this.deps.tools, {
      deviceId: options.deviceId,
      timeoutSec: options.timeoutSec ?? this.deps.settings.toolTimeoutSec
    })

    if (checkRoot) {
      await run.runTool(this.deps.runner, {ref: stages.root, invocation: adb.rootCheck()}, cause => new DumpError(
        'root-required',
        'Root access is required to read the dump. Ensure the device is rooted and su is available',
        {stage: stages.root.id, tool: 'adb', cause}
      ))
    } else {
      run.skip(stages.root, 'disabled')
    }

    const {stdout} = await run.runTool(this.deps.runner, {ref: stages.read, invocation: adb.readFile(devicePath)}, cause => new DumpError(
      'read-failed',
      `Failed to read ${devicePath}`,
      {stage: stages.read.id, tool: 'adb', artifact: devicePath, cause}
    ))

    return run.step(stages.save, async () => {
      if (stdout.trim() === '') {
        throw new DumpError('empty', `Dump file ${devicePath} is empty. Start the app at least once after installing it`, {stage: stages.save.id, artifact: devicePath})
      }

      await mkdir(dirname(dumpPath), {recursive: true})
      await writeFile(dumpPath, stdout, 'utf8')

      let jsonPath: string | undefined
      const formatted = format ? formatJson(stdout) : undefined
      if (formatted !== undefined) {
        jsonPath = jsonCopyPath(dumpPath)
        await writeFile(jsonPath, formatted, 'utf8')
      }

      return {packageName, dumpPath, jsonPath, bytes: Buffer.byteLength(stdout, 'utf8')}
    }, cause => cause instanceof DumpError
      ? cause
      : new DumpError('read-failed', `Failed to save the dump to ${dumpPath}`, {stage: stages.save.id, artifact: dumpPath, cause}), dumpPath)
  }
}
