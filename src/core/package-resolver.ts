import {basename, extname} from 'node:path'
import type {ToolRunner} from '../engine/executor.js'
import {invoke} from '../engine/invoke.js'
import {ToolExecutionError, ValidationError} from '../errors.js'
import type {ToolLocator} from './tool-locator.js'

export type ResolvedPackage = {
  packageName: string;
  /** How the name was found */
  source: 'aapt' | 'filename';
}

const badgingPattern = /package: name='([^']+)'/

const filenameSuffixes = ['_merged', '-merged', '-signed', '-aligned', '-debugSigned']

/**
 * Extracts the package name from `aapt dump badging` output.
 */
export function parseBadging(output: string): string | undefined {
  return badgingPattern.exec(output)?.[1]
}

/**
 * Guesses a package name from an APK file name such as
 * `com.example.app-4.7.1-signed.apk` or `com_example_app_merged.apk`.
 * @throws {ValidationError} If the result does not look like a package name
 */
export function packageFromFilename(apkPath: string): string {
  let stem = basename(apkPath, extname(apkPath)).replace(/-\d+\.\d+.*$/, '')
  for (const suffix of filenameSuffixes) {
    stem = stem.replaceAll(suffix, '')
  }

  if (stem.includes('_') && !stem.includes('.')) {
    stem = stem.replaceAll('_', '.')
  }

  if (!stem.includes('.')) {
    throw new ValidationError(`Could not extract package name from ${apkPath}. The file name gave '${stem}', which is not a package name. Install the Android SDK build-tools (aapt) or pass the package name explicitly.`)
  }

  return stem
}

/**
 * Resolves the package name of an APK: `aapt dump badging` first, the file
 * name when aapt is missing or cannot read the APK.
 */
export class PackageResolver {
  constructor(
    private readonly runner: ToolRunner,
    private readonly tools: ToolLocator
  ) {}

  async resolve(apkPath: string, timeoutSec?: number): Promise<ResolvedPackage> {
    const fromAapt = await this.fromAapt(apkPath, timeoutSec)
    if (fromAapt) {
      return {packageName: fromAapt, source: 'aapt'}
    }

    return {packageName: packageFromFilename(apkPath), source: 'filename'}
  }

  private async fromAapt(apkPath: string, timeoutSec?: number): Promise<string | undefined> {
    try {
      const aapt = await this.tools.command('aapt')
      const result = await invoke(this.runner, {
        tool: 'aapt',
        command: [...aapt, 'dump', 'badging', apkPath],
        timeoutSec,
        check: false
      })
      return result.exitCode === 0 ? parseBadging(result.stdout) : undefined
    } catch (error) {
      if (error instanceof ToolExecutionError) {
        return undefined
      }

      throw error
    }
  }
}
