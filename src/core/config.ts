import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {homedir} from 'node:os'
import {join, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {ConfigurationError, isErrnoCode} from '../errors.js'
import {expandHome} from '../engine/resolvers.js'

export const toolNames = ['apktool', 'jadx', 'zipalign', 'apksigner', 'keytool', 'reflutter', 'adb', 'aapt', 'apkeditor'] as const

export type ToolName = typeof toolNames[number]

export const configFileName = 'config.yml'

const toolCommand = z.string().min(1)

const ToolOverridesSchema = z.object({
  apktool: toolCommand.optional(),
  jadx: toolCommand.optional(),
  zipalign: toolCommand.optional(),
  apksigner: toolCommand.optional(),
  keytool: toolCommand.optional(),
  reflutter: toolCommand.optional(),
  adb: toolCommand.optional(),
  aapt: toolCommand.optional()
}).strict()

/**
 * Persisted user configuration (`config.yml` in the droidsmith home).
 */
export const ConfigSchema = z.object({
  keystoreDir: z.string().min(1).optional(),
  apkeditorPath: z.string().min(1).optional(),
  androidHome: z.string().min(1).optional(),
  toolTimeoutSec: z.number().positive('toolTimeoutSec must be positive').optional(),
  startGraceSec: z.number().nonnegative('startGraceSec cannot be negative').optional(),
  tools: ToolOverridesSchema.optional()
}).strict()

export type DroidsmithConfig = z.infer<typeof ConfigSchema>

export type KeystoreSettings = {
  /** Directory holding the generated debug keystore */
  dir: string;
  fileName: string;
  alias: string;
  storePassword: string;
  keyPassword: string;
  distinguishedName: string;
  keyAlgorithm: string;
  keySize: number;
  validityDays: number;
}

export type InstrumentationSettings = {
  /** Framework the instrumentation tool targets */
  framework: string;
  /** File the instrumentation tool writes into its working directory */
  outputFileName: string;
  /** Device path of the runtime dump; `{package}` is replaced by the package name */
  deviceDumpPath: string;
  /** Pause after an automated launch before reading the dump */
  startGraceMs: number;
}

/**
 * Fully resolved settings threaded through every component.
 * Every default path can be overridden, tests included.
 */
export type Settings = {
  home: string;
  keystore: KeystoreSettings;
  instrumentation: InstrumentationSettings;
  tools: DroidsmithConfig['tools'];
  apkeditorPath?: string;
  androidHome?: string;
  toolTimeoutSec?: number;
  /** Environment the tool locator reads (PATH, APKEDITOR_JAR, ANDROID_HOME) */
  env: Record<string, string | undefined>;
}

export const debugKeystoreDefaults: Omit<KeystoreSettings, 'dir'> = {
  fileName: 'debug.keystore',
  alias: 'androiddebugkey',
  storePassword: 'android',
  keyPassword: 'android',
  distinguishedName: 'CN=Debug, OU=Debug, O=Debug, L=Debug, ST=Debug, C=US',
  keyAlgorithm: 'RSA',
  keySize: 2048,
  validityDays: 10_000
}

export const instrumentationDefaults: InstrumentationSettings = {
  framework: 'Flutter',
  outputFileName: 'release.RE.apk',
  deviceDumpPath: '/data/data/{package}/dump.dart',
  startGraceMs: 8000
}

/**
 * Returns the droidsmith home directory: `$DROIDSMITH_HOME` or `~/.droidsmith`.
 */
export function droidsmithHome(env: Record<string, string | undefined> = process.env): string {
  const value = env.DROIDSMITH_HOME?.trim()
  if (value) {
    return expandHome(value)
  }

  return resolve(join(homedir(), '.droidsmith'))
}

/**
 * Loads and validates `config.yml` from a directory.
 * Returns an empty config when the file does not exist.
 * @throws {ConfigurationError} If the file is not valid YAML or has unknown or invalid keys
 */
export async function loadConfig(dir: string): Promise<DroidsmithConfig> {
  const path = join(dir, configFileName)
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (isErrnoCode(error, 'ENOENT')) {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${path}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  const result = ConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration in ${path}:\n  ${issues.join('\n  ')}`)
  }

  return result.data
}

/**
 * Merges the persisted config, the environment and the documented defaults.
 */
export function resolveSettings(config: DroidsmithConfig, options: {home: string; env?: Record<string, string | undefined>}): Settings {
  const env = options.env ?? process.env
  return {
    home: options.home,
    keystore: {
      ...debugKeystoreDefaults,
      dir: config.keystoreDir ? expandHome(config.keystoreDir) : options.home
    },
    instrumentation: {
      ...instrumentationDefaults,
      startGraceMs: config.startGraceSec === undefined ? instrumentationDefaults.startGraceMs : config.startGraceSec * 1000
    },
    tools: config.tools,
    apkeditorPath: config.apkeditorPath,
    androidHome: config.androidHome,
    toolTimeoutSec: config.toolTimeoutSec,
    env
  }
}
