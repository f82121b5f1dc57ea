import process from 'node:process'
import {setTimeout} from 'node:timers/promises'
import {join, resolve} from 'node:path'
import {apkGates, checkGates} from '../engine/gates.js'
import {withStagingArea} from '../engine/staging.js'
import {DumpError, FrameworkMismatchError, InstallError, InstrumentationError} from '../errors.js'
import type {DumpFailure, DumpResult, InstrumentationResult, StartMode} from '../types.js'
import {AdbCommands} from './adb.js'
import {BuildPipeline} from './build-pipeline.js'
import {assertPackageName, DumpService} from './dump-service.js'
import {ZipFrameworkDetector, type FrameworkDetector} from './framework-detector.js'
import {PackageResolver} from './package-resolver.js'
import {PipelineRun, type PipelineDeps} from './pipeline-run.js'
import {toolCall} from './tool-locator.js'

/**
 * Blocking wait for a human action. There is no timeout: the wait ends
 * when the user answers or the process is interrupted.
 */
export type UserPrompt = {
  waitForUser(message: string): Promise<void>;
}

export type InstrumentOptions = {
  apkPath: string;
  /** Package name; resolved from the APK when absent */
  packageName?: string;
  /** Directory receiving the signed APK and the dump (default current directory) */
  outputDir?: string;
  deviceId?: string;
  /** Stop after installing */
  skipDump?: boolean;
  /** Wait for the user to start the app instead of launching it */
  waitForUser?: boolean;
  /** Skip the framework check */
  force?: boolean;
  /** Check for a root shell before the dump (default true) */
  checkRoot?: boolean;
  /** Also write an indented JSON copy of the dump (default true) */
  format?: boolean;
  timeoutSec?: number;
}

export type InstrumentationCollaborators = {
  prompt: UserPrompt;
  detector?: FrameworkDetector;
  packages?: PackageResolver;
  build?: BuildPipeline;
  dump?: DumpService;
  /** Pause after an automated launch */
  sleep?: (ms: number) => Promise<void>;
}

const stages = {
  detect: {id: 'detect', displayName: 'Detect frameworks'},
  packageName: {id: 'package', displayName: 'Resolve package name'},
  instrument: {id: 'instrument', displayName: 'Instrument APK'},
  decode: {id: 'decode', displayName: 'Decode instrumented APK'},
  uninstall: {id: 'uninstall', displayName: 'Uninstall previous version'},
  install: {id: 'install', displayName: 'Install instrumented APK'},
  launch: {id: 'launch', displayName: 'Launch app'}
}

export function signedApkName(packageName: string): string {
  return `${packageName}-instrumented-signed.apk`
}

/**
 * Instruments an APK, re-signs it, installs it on a device and collects the
 * runtime dump.
 *
 * The instrumented APK is decoded and sent through the build pipeline,
 * since instrumentation invalidates the original signature. The dump is
 * best effort: once the APK is installed, a failed dump is reported as a
 * warning and the run still succeeds.
 */
export class InstrumentationWorkflow {
  private readonly prompt: UserPrompt
  private readonly detector: FrameworkDetector
  private readonly packages: PackageResolver
  private readonly build: BuildPipeline
  private readonly dumps: DumpService
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly deps: PipelineDeps, collaborators: InstrumentationCollaborators) {
    this.prompt = collaborators.prompt
    this.detector = collaborators.detector ?? new ZipFrameworkDetector()
    this.packages = collaborators.packages ?? new PackageResolver(deps.runner, deps.tools)
    this.build = collaborators.build ?? new BuildPipeline(deps)
    this.dumps = collaborators.dump ?? new DumpService(deps)
    this.sleep = collaborators.sleep ?? (async ms => {
      await setTimeout(ms)
    })
  }

  /**
   * @throws {ValidationError} If the input is not an APK
   * @throws {FrameworkMismatchError} If the APK lacks the target framework
   * @throws {InstrumentationError} If the instrumentation tool or the decode fails
   * @throws {InstallError} If the signed APK cannot be installed
   */
  async run(options: InstrumentOptions): Promise<InstrumentationResult> {
    const run = PipelineRun.start(this.deps.reporter, 'instrument', options.apkPath)
    return run.complete(async () => this.execute(run, options), result => result.signedApk)
  }

  private async execute(run: PipelineRun, options: InstrumentOptions): Promise<InstrumentationResult> {
    const {runner, tools, settings} = this.deps
    const {framework, outputFileName, startGraceMs} = settings.instrumentation
    const apkPath = resolve(options.apkPath)
    const outputDir = resolve(options.outputDir ?? process.cwd())
    const timeoutSec = options.timeoutSec ?? settings.toolTimeoutSec
    const adb = new AdbCommands(tools, {deviceId: options.deviceId, timeoutSec})

    await checkGates(apkGates(apkPath))

    let frameworks: string[] = []
    if (options.force) {
      run.skip(stages.detect, 'disabled')
    } else {
      const report = await run.step(stages.detect, async () => this.detector.detect(apkPath))
      frameworks = report.frameworks.map(match => match.name)
      if (!frameworks.includes(framework)) {
        throw new FrameworkMismatchError(framework, frameworks, apkPath)
      }
    }

    const packageName = await run.step(stages.packageName, async () => assertPackageName(
      options.packageName ?? (await this.packages.resolve(apkPath, timeoutSec)).packageName
    ))
    const signedApk = join(outputDir, signedApkName(packageName))

    const build = await withStagingArea('droidsmith-instrument-', async staging => {
      const instrumented = await run.runStage(runner, {
        ref: stages.instrument,
        invocation: toolCall(tools, 'reflutter', [apkPath], {cwd: staging.path, timeoutSec}),
        artifact: {path: staging.file(outputFileName), kind: 'file'}
      }, cause => new InstrumentationError(`Failed to instrument ${apkPath}`, {stage: stages.instrument.id, tool: 'reflutter', artifact: staging.file(outputFileName), cause}))

      const decoded = staging.file('decoded')
      await run.runStage(runner, {
        ref: stages.decode,
        invocation: toolCall(tools, 'apktool', ['d', '-o', decoded, instrumented, '-f'], {timeoutSec}),
        artifact: {path: decoded, kind: 'directory'}
      }, cause => new InstrumentationError('Failed to decode the instrumented APK', {stage: stages.decode.id, tool: 'apktool', artifact: decoded, cause}))

      return this.build.execute(run, {sourceDir: decoded, outputPath: signedApk, timeoutSec})
    }, {root: this.deps.stagingRoot})

    try {
      const {exitCode} = await run.runTool(runner, {ref: stages.uninstall, invocation: adb.uninstall(packageName)})
      if (exitCode !== 0) {
        run.warn(`${packageName} was not uninstalled (it may not be installed)`)
      }
    } catch (error) {
      run.warn(`Uninstall of ${packageName} failed: ${error instanceof Error ? error.message : String(error)}`)
    }

    await run.runTool(runner, {ref: stages.install, invocation: adb.install(signedApk)}, cause => new InstallError(
      `Failed to install ${signedApk}`,
      {stage: stages.install.id, tool: 'adb', artifact: signedApk, cause}
    ))

    const result: InstrumentationResult = {
      packageName,
      originalApk: apkPath,
      signedApk: build.outputPath,
      frameworks,
      build,
      installed: true,
      start: 'skipped'
    }

    if (options.skipDump) {
      return result
    }

    result.start = await this.startApp(run, adb, packageName, options.waitForUser ?? false, startGraceMs)

    const dump = await this.tryDump(run, {
      packageName,
      outputDir,
      deviceId: options.deviceId,
      checkRoot: options.checkRoot,
      format: options.format,
      timeoutSec
    })
    return {...result, ...dump}
  }

  private async startApp(run: PipelineRun, adb: AdbCommands, packageName: string, waitForUser: boolean, graceMs: number): Promise<StartMode> {
    const message = `Start ${packageName} on the device, then press Enter`
    if (waitForUser) {
      await this.prompt.waitForUser(message)
      return 'manual'
    }

    try {
      await run.runTool(this.deps.runner, {ref: stages.launch, invocation: adb.launch(packageName)})
    } catch (error) {
      run.warn(`Could not launch ${packageName}: ${error instanceof Error ? error.message : String(error)}`)
      await this.prompt.waitForUser(message)
      return 'auto-fallback-manual'
    }

    await this.sleep(graceMs)
    return 'auto'
  }

  private async tryDump(run: PipelineRun, options: Parameters<DumpService['execute']>[1]): Promise<{dump?: DumpResult; dumpError?: DumpFailure}> {
    try {
      return {dump: await this.dumps.execute(run, options)}
    } catch (error) {
      const dumpError: DumpFailure = error instanceof DumpError
        ? {reason: error.dumpReason, message: error.message}
        : {reason: 'read-failed', message: error instanceof Error ? error.message : String(error)}
      run.warn(`${dumpError.message}. Retry later with: droidsmith dump ${options.packageName}`)
      return {dumpError}
    }
  }
}
