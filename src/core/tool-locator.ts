import process from 'node:process'
import {join} from 'node:path'
import {ToolNotFoundError} from '../errors.js'
import {
  expandHome,
  fromPath,
  fromValue,
  isDirectoryPath,
  isRegularFile,
  resolveFirst,
  type ToolResolver
} from '../engine/resolvers.js'
import {findAndroidHome, findBuildTools} from './android-sdk.js'
import type {ToolInvocation} from '../engine/types.js'
import type {Settings, ToolName} from './config.js'

/**
 * Resolves the command prefix used to launch each external tool.
 */
export type ToolLocator = {
  /**
   * @throws {ToolNotFoundError} If no strategy can locate the tool
   */
  command(tool: ToolName): Promise<string[]>;
}

export const installHints: Record<ToolName, string> = {
  adb: 'https://developer.android.com/tools/releases/platform-tools',
  apktool: 'https://apktool.org/',
  jadx: 'https://github.com/skylot/jadx',
  apkeditor: 'https://github.com/REAndroid/APKEditor (set APKEDITOR_JAR, configure apkeditorPath in config.yml, or add an APKEditor wrapper to PATH)',
  zipalign: 'Part of Android SDK build-tools (set ANDROID_HOME)',
  apksigner: 'Part of Android SDK build-tools (set ANDROID_HOME)',
  aapt: 'Part of Android SDK build-tools (set ANDROID_HOME)',
  keytool: 'Part of the Java JDK (install a JDK and ensure it is on PATH)',
  reflutter: 'https://github.com/Impact-I/reFlutter'
}

/**
 * Builds a deferred invocation: the tool is located when the stage runs,
 * after its gates pass.
 */
export function toolCall(
  tools: ToolLocator,
  tool: ToolName,
  args: readonly string[],
  options: Omit<ToolInvocation, 'tool' | 'command'> = {}
): () => Promise<ToolInvocation> {
  return async () => ({...options, tool, command: [...await tools.command(tool), ...args]})
}

export const apkeditorEnvVar = 'APKEDITOR_JAR'
export const apkeditorJarName = 'APKEditor.jar'

const sdkBinaries: Partial<Record<ToolName, {posix: string; win32: string}>> = {
  zipalign: {posix: 'zipalign', win32: 'zipalign.exe'},
  apksigner: {posix: 'apksigner', win32: 'apksigner.bat'},
  aapt: {posix: 'aapt', win32: 'aapt.exe'}
}

/**
 * Turns a jar path, or a directory containing `APKEditor.jar`, into a
 * `java -jar` command.
 */
export async function jarCommand(value: string): Promise<string[] | undefined> {
  const path = expandHome(value)
  if (await isRegularFile(path)) {
    return ['java', '-jar', path]
  }

  if (await isDirectoryPath(path)) {
    const jar = join(path, apkeditorJarName)
    if (await isRegularFile(jar)) {
      return ['java', '-jar', jar]
    }
  }

  return undefined
}

/**
 * Locates tools on the local machine.
 *
 * Resolution order, first match wins:
 * - APKEditor: `APKEDITOR_JAR`, then `apkeditorPath` from config.yml, then
 *   an `APKEditor` wrapper on PATH
 * - build-tools binaries (zipalign, apksigner, aapt): config override, the
 *   newest build-tools of the Android SDK, then PATH
 * - everything else: config override, then PATH
 */
export class SystemToolLocator implements ToolLocator {
  private readonly resolved = new Map<ToolName, string[]>()

  constructor(
    private readonly settings: Pick<Settings, 'tools' | 'apkeditorPath' | 'androidHome' | 'env'>,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async command(tool: ToolName): Promise<string[]> {
    const cached = this.resolved.get(tool)
    if (cached) {
      return cached
    }

    const command = await resolveFirst(this.resolvers(tool))
    if (!command) {
      throw new ToolNotFoundError(tool, installHints[tool])
    }

    this.resolved.set(tool, command)
    return command
  }

  private resolvers(tool: ToolName): ToolResolver[] {
    const {env} = this.settings
    const extensions = this.platform === 'win32' ? ['.exe', '.bat', '.cmd', ''] : ['']

    if (tool === 'apkeditor') {
      return [
        fromValue(env[apkeditorEnvVar], jarCommand),
        fromValue(this.settings.apkeditorPath, jarCommand),
        fromPath('APKEditor', env.PATH, extensions)
      ]
    }

    const resolvers: ToolResolver[] = [
      fromValue(this.settings.tools?.[tool], async value => [value.includes('/') || value.startsWith('~') ? expandHome(value) : value])
    ]

    const sdkBinary = sdkBinaries[tool]
    if (sdkBinary) {
      resolvers.push(async () => this.fromBuildTools(this.platform === 'win32' ? sdkBinary.win32 : sdkBinary.posix))
    }

    resolvers.push(fromPath(tool, env.PATH, extensions))
    return resolvers
  }

  private async fromBuildTools(binary: string): Promise<string[] | undefined> {
    const androidHome = await findAndroidHome({androidHome: this.settings.androidHome, env: this.settings.env, platform: this.platform})
    if (!androidHome) {
      return undefined
    }

    const buildTools = await findBuildTools(androidHome)
    if (!buildTools) {
      return undefined
    }

    const candidate = join(buildTools, binary)
    return await isRegularFile(candidate) ? [candidate] : undefined
  }
}
