import {stat} from 'node:fs/promises'
import type {Command} from 'commander'
import {AdbCommands} from '../../core/adb.js'
import {BuildPipeline} from '../../core/build-pipeline.js'
import type {SigningIdentity} from '../../core/keystore.js'
import {PipelineRun} from '../../core/pipeline-run.js'
import {InstallError, ValidationError} from '../../errors.js'
import {createDeps, formatSize, printResult, yesNo} from '../utils.js'

type BuildCommandOptions = {
  output?: string;
  keystore?: string;
  keyAlias?: string;
  keystorePass?: string;
  keyPass?: string;
  align: boolean;
  sign: boolean;
  verify?: boolean;
  install?: boolean;
  device?: string;
}

function signingIdentity(options: BuildCommandOptions): SigningIdentity | undefined {
  if (!options.keystore) {
    return undefined
  }

  if (!options.keyAlias || !options.keystorePass) {
    throw new ValidationError('--keystore requires --key-alias and --keystore-pass')
  }

  return {
    keystore: options.keystore,
    alias: options.keyAlias,
    storePassword: options.keystorePass,
    keyPassword: options.keyPass ?? options.keystorePass
  }
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Rebuild a decoded project into an aligned, signed APK')
    .argument('<dir>', 'Decoded project directory (contains apktool.yml)')
    .option('-o, --output <path>', 'Output APK (default: <dir>-patched.apk)')
    .option('-k, --keystore <path>', 'Keystore to sign with (default: the debug keystore)')
    .option('--key-alias <alias>', 'Key alias in the keystore')
    .option('--keystore-pass <password>', 'Keystore password')
    .option('--key-pass <password>', 'Key password (default: the keystore password)')
    .option('--no-align', 'Skip zipalign')
    .option('--no-sign', 'Skip signing and copy the built APK as is')
    .option('--verify', 'Verify the signature after signing')
    .option('--install', 'Install the APK on the device afterwards')
    .option('-d, --device <serial>', 'Target device for --install')
    .action(async (dir: string, options: BuildCommandOptions, cmd: Command) => {
      const {json, ...deps} = await createDeps(cmd)
      const identity = signingIdentity(options)
      const pipeline = new BuildPipeline(deps)
      const run = PipelineRun.start(deps.reporter, 'build', dir)

      const result = await run.complete(async () => {
        const built = await pipeline.execute(run, {
          sourceDir: dir,
          outputPath: options.output,
          align: options.align,
          sign: options.sign,
          verify: options.verify,
          identity
        })

        if (options.install) {
          const adb = new AdbCommands(deps.tools, {deviceId: options.device, timeoutSec: deps.settings.toolTimeoutSec})
          await run.runTool(deps.runner, {
            ref: {id: 'install', displayName: 'Install APK'},
            invocation: adb.install(built.outputPath, {replace: true})
          }, cause => new InstallError(`Failed to install ${built.outputPath}`, {stage: 'install', tool: 'adb', artifact: built.outputPath, cause}))
        }

        return built
      }, built => built.outputPath)

      const {size} = await stat(result.outputPath)
      printResult(json, {...result, installed: options.install ?? false}, [
        ['Output', `${result.outputPath} (${formatSize(size)})`],
        ['Aligned', yesNo(result.aligned)],
        ['Signed', yesNo(result.signed)],
        ['Keystore', result.keystorePath ? `${result.keystorePath}${result.keystoreGenerated ? ' (generated)' : ''}` : undefined],
        ['Verified', result.signed ? yesNo(result.verified) : undefined],
        ['Installed', options.install ? yesNo(true) : undefined]
      ])
    })
}
