import {basename} from 'node:path'
import type {Command} from 'commander'
import {MergePipeline} from '../../core/merge-pipeline.js'
import {createDeps, printResult} from '../utils.js'

export function registerMergeCommand(program: Command): void {
  program
    .command('merge')
    .description('Merge a directory of split APKs into one APK with APKEditor')
    .argument('<dir>', 'Directory holding the base and split APKs')
    .option('-o, --output <path>', 'Merged APK (default: <dir>.merged.apk)')
    .action(async (dir: string, options: {output?: string}, cmd: Command) => {
      const {json, ...deps} = await createDeps(cmd)
      const result = await new MergePipeline(deps).run({inputDir: dir, outputPath: options.output})

      printResult(json, result, [
        ['Output', result.outputPath],
        ['Base', basename(result.artifacts.base)],
        ['Splits', result.artifacts.splits.length > 0 ? result.artifacts.splits.map(split => basename(split)).join(', ') : 'none'],
        ['Replaced', result.replacedExisting ? 'previous output removed' : undefined]
      ])
    })
}
