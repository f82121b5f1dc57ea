import type {Command} from 'commander'
import {DecompilePipeline} from '../../core/decompile-pipeline.js'
import type {StageOutcome} from '../../types.js'
import {createDeps, printResult} from '../utils.js'

type DecompileCommandOptions = {
  output?: string;
  java: boolean;
  smali: boolean;
  strict: boolean;
}

function describeOutcome(outcome: StageOutcome | undefined): string | undefined {
  if (!outcome) {
    return undefined
  }

  return outcome.ok ? outcome.path : `failed: ${outcome.error.message.split('\n')[0]}`
}

function serializeOutcome(outcome: StageOutcome | undefined) {
  if (!outcome) {
    return undefined
  }

  return outcome.ok ? outcome : {ok: false, error: outcome.error.message}
}

export function registerDecompileCommand(program: Command): void {
  program
    .command('decompile')
    .description('Extract Java sources (jadx) and smali/resources (apktool) from an APK')
    .argument('<apk>', 'APK file')
    .option('-o, --output <dir>', 'Output directory (default: ./<apk name>)')
    .option('--no-java', 'Skip Java source extraction')
    .option('--no-smali', 'Skip smali and resource extraction')
    .option('--no-strict', 'Skip the ZIP header check')
    .action(async (apk: string, options: DecompileCommandOptions, cmd: Command) => {
      const {json, ...deps} = await createDeps(cmd)
      const result = await new DecompilePipeline(deps).run({
        apkPath: apk,
        outputDir: options.output,
        java: options.java,
        smali: options.smali,
        strict: options.strict
      })

      printResult(json, {...result, java: serializeOutcome(result.java), smali: serializeOutcome(result.smali)}, [
        ['Output', result.outputDir],
        ['Java', describeOutcome(result.java)],
        ['Smali', describeOutcome(result.smali)]
      ])
    })
}
