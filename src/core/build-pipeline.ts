import {copyFile, mkdir} from 'node:fs/promises'
import {dirname, resolve} from 'node:path'
import {isDirectory, isFile, markerFile, pathExists} from '../engine/gates.js'
import {withStagingArea} from '../engine/staging.js'
import {AlignError, BuildError, SignError} from '../errors.js'
import type {BuildResult} from '../types.js'
import {DebugKeystoreProvider, type SigningIdentity} from './keystore.js'
import {PipelineRun, type PipelineDeps} from './pipeline-run.js'
import {toolCall} from './tool-locator.js'

/** Marker file apktool writes at the root of a decoded project. */
export const projectMarker = 'apktool.yml'

/** Page alignment for uncompressed native libraries, in KiB. */
export const pageAlignmentKb = 16

/** Byte alignment of uncompressed entries. */
export const entryAlignment = 4

export type BuildOptions = {
  /** Decoded project directory, containing `apktool.yml` */
  sourceDir: string;
  /** Final APK path (default `<sourceDir>-patched.apk`) */
  outputPath?: string;
  /** Run zipalign (default true) */
  align?: boolean;
  /** Run apksigner (default true); when false the staged APK is copied as is */
  sign?: boolean;
  /** Verify the signature after signing (default false) */
  verify?: boolean;
  /** Signing identity; the debug identity is provisioned when absent */
  identity?: SigningIdentity;
  /** Per-tool timeout, overriding `toolTimeoutSec` from settings */
  timeoutSec?: number;
}

const stages = {
  build: {id: 'build', displayName: 'Build APK'},
  align: {id: 'align', displayName: 'Align APK'},
  sign: {id: 'sign', displayName: 'Sign APK'},
  copy: {id: 'copy', displayName: 'Copy unsigned APK'},
  verify: {id: 'verify', displayName: 'Verify signature'}
}

export function defaultBuildOutput(sourceDir: string): string {
  return `${resolve(sourceDir)}-patched.apk`
}

/**
 * Rebuilds a decoded project into an installable APK: apktool build, then
 * zipalign, then apksigner.
 *
 * Intermediate APKs live in a staging area removed when the run ends; only
 * the final output path is written outside it.
 */
export class BuildPipeline {
  private readonly keystore: DebugKeystoreProvider

  constructor(private readonly deps: PipelineDeps, keystore?: DebugKeystoreProvider) {
    this.keystore = keystore ?? new DebugKeystoreProvider(deps.runner, deps.tools, deps.settings.keystore)
  }

  /**
   * Runs the pipeline as its own reported run.
   * @throws {BuildError} If the project is invalid or apktool fails
   * @throws {AlignError} If zipalign fails
   * @throws {SignError} If the keystore cannot be provisioned or apksigner fails
   */
  async run(options: BuildOptions): Promise<BuildResult> {
    const run = PipelineRun.start(this.deps.reporter, 'build', options.sourceDir)
    return run.complete(async () => this.execute(run, options), result => result.outputPath)
  }

  /**
   * Runs the stages under an existing run, so that a compound workflow
   * reports them as its own.
   */
  async execute(run: PipelineRun, options: BuildOptions): Promise<BuildResult> {
    const {runner, tools} = this.deps
    const sourceDir = resolve(options.sourceDir)
    const outputPath = resolve(options.outputPath ?? defaultBuildOutput(sourceDir))
    const {align = true, sign = true, verify = false} = options
    const timeoutSec = options.timeoutSec ?? this.deps.settings.toolTimeoutSec
    const firstStage = run.stages.length

    return withStagingArea('droidsmith-build-', async staging => {
      const built = staging.file('built.apk')
      let current = await run.runStage(runner, {
        ref: stages.build,
        gates: [pathExists(sourceDir, 'Project directory'), isDirectory(sourceDir), markerFile(sourceDir, projectMarker)],
        invocation: toolCall(tools, 'apktool', ['b', sourceDir, '-o', built], {timeoutSec}),
        artifact: {path: built, kind: 'file'}
      }, cause => new BuildError(`Failed to build ${sourceDir}`, {stage: stages.build.id, tool: 'apktool', artifact: built, cause}))

      if (align) {
        const aligned = staging.file('aligned.apk')
        current = await run.runStage(runner, {
          ref: stages.align,
          invocation: toolCall(tools, 'zipalign', ['-P', String(pageAlignmentKb), String(entryAlignment), current, aligned], {timeoutSec}),
          artifact: {path: aligned, kind: 'file'}
        }, cause => new AlignError(`Failed to align ${current}`, {stage: stages.align.id, tool: 'zipalign', artifact: aligned, cause}))
      } else {
        run.skip(stages.align, 'disabled')
      }

      await mkdir(dirname(outputPath), {recursive: true})

      let keystoreGenerated = false
      let keystorePath: string | undefined
      if (sign) {
        let identity = options.identity
        if (!identity) {
          const provisioned = await this.keystore.provision(run, timeoutSec)
          identity = provisioned.identity
          keystoreGenerated = provisioned.generated
        }

        keystorePath = identity.keystore
        const input = current
        await run.runStage(runner, {
          ref: stages.sign,
          gates: [pathExists(identity.keystore, 'Keystore'), isFile(identity.keystore)],
          invocation: toolCall(tools, 'apksigner', [
            'sign',
            '--ks',
            identity.keystore,
            '--ks-key-alias',
            identity.alias,
            '--ks-pass',
            `pass:${identity.storePassword}`,
            '--key-pass',
            `pass:${identity.keyPassword}`,
            '--out',
            outputPath,
            input
          ], {timeoutSec}),
          artifact: {path: outputPath, kind: 'file'}
        }, cause => new SignError(`Failed to sign ${input}`, {stage: stages.sign.id, tool: 'apksigner', artifact: outputPath, cause}))
      } else {
        run.skip(stages.sign, 'disabled')
        const input = current
        await run.step(stages.copy, async () => copyFile(input, outputPath), cause => new BuildError(`Failed to copy ${input} to ${outputPath}`, {stage: stages.copy.id, artifact: outputPath, cause}), outputPath)
      }

      let verified: boolean | undefined
      if (verify && sign) {
        const result = await run.runTool(runner, {
          ref: stages.verify,
          invocation: toolCall(tools, 'apksigner', ['verify', '--verbose', outputPath], {timeoutSec, check: false})
        }, cause => new SignError(`Failed to run the signature verifier on ${outputPath}`, {stage: stages.verify.id, tool: 'apksigner', artifact: outputPath, cause}))
        verified = result.exitCode === 0
        if (!verified) {
          run.warn(`Signature verification failed for ${outputPath}`)
        }
      } else if (verify) {
        run.skip(stages.verify, 'not-requested')
        run.warn('Signature verification skipped: the output is not signed')
      }

      return {
        sourceDir,
        outputPath,
        aligned: align,
        signed: sign,
        verified,
        keystoreGenerated,
        keystorePath,
        stages: run.stages.slice(firstStage)
      }
    }, {root: this.deps.stagingRoot})
  }
}
