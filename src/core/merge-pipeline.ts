import {mkdir, unlink} from 'node:fs/promises'
import {dirname, resolve} from 'node:path'
import {checkGates, containsFiles, isDirectory, pathExists} from '../engine/gates.js'
import {isErrnoCode, MergeError} from '../errors.js'
import type {MergeResult} from '../types.js'
import {PipelineRun, type PipelineDeps} from './pipeline-run.js'
import {readSplitDirectory} from './split-artifacts.js'

export type MergeOptions = {
  /** Directory holding the base and split APKs */
  inputDir: string;
  /** Merged APK path (default `<inputDir>.merged.apk` beside the directory) */
  outputPath?: string;
  timeoutSec?: number;
}

const stages = {
  inspect: {id: 'inspect', displayName: 'Inspect split APKs'},
  merge: {id: 'merge', displayName: 'Merge split APKs'}
}

export function defaultMergeOutput(inputDir: string): string {
  return `${resolve(inputDir)}.merged.apk`
}

/**
 * Removes a file, reporting whether it was there.
 */
async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path)
    return true
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return false
    }

    throw error
  }
}

/**
 * Merges a split application into one APK with APKEditor.
 *
 * Merging is not incremental: a file already at the output path is removed
 * before the tool runs. When that path lies inside the input directory, the
 * file is not part of the split set.
 */
export class MergePipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * @throws {MergeError} If the directory holds no APK, APKEditor cannot be
   * resolved or fails, or the merged APK is missing
   */
  async run(options: MergeOptions): Promise<MergeResult> {
    const run = PipelineRun.start(this.deps.reporter, 'merge', options.inputDir)
    return run.complete(async () => this.execute(run, options), result => result.outputPath)
  }

  private async execute(run: PipelineRun, options: MergeOptions): Promise<MergeResult> {
    const inputDir = resolve(options.inputDir)
    const outputPath = resolve(options.outputPath ?? defaultMergeOutput(inputDir))
    const timeoutSec = options.timeoutSec ?? this.deps.settings.toolTimeoutSec

    const artifacts = await run.step(stages.inspect, async () => {
      const except = [outputPath]
      await checkGates([pathExists(inputDir, 'Split APK directory'), isDirectory(inputDir), containsFiles(inputDir, '.apk', {except})])
      return readSplitDirectory(inputDir, {except})
    }, cause => new MergeError(`Cannot merge ${inputDir}`, {stage: stages.inspect.id, artifact: inputDir, cause}))

    let replacedExisting = false
    await run.runStage(this.deps.runner, {
      ref: stages.merge,
      invocation: async () => {
        const command = await this.deps.tools.command('apkeditor')
        await mkdir(dirname(outputPath), {recursive: true})
        replacedExisting = await removeFile(outputPath)
        return {
          tool: 'apkeditor',
          command: [...command, 'merge', '-i', inputDir, '-o', outputPath],
          timeoutSec
        }
      },
      artifact: {path: outputPath, kind: 'file'}
    }, cause => new MergeError(`Failed to merge ${inputDir}`, {stage: stages.merge.id, tool: 'apkeditor', artifact: outputPath, cause}))

    return {
      inputDir,
      outputPath,
      artifacts,
      replacedExisting,
      stages: [...run.stages]
    }
  }
}
