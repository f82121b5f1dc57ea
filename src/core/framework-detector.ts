import {resolve} from 'node:path'
import yauzl from 'yauzl'
import {apkGates, checkGates} from '../engine/gates.js'
import {ValidationError} from '../errors.js'

/**
 * Entry paths whose presence in an APK is evidence of a framework. A path
 * ending in `/` matches any entry under that directory.
 */
export const frameworkSignatures: Record<string, readonly string[]> = {
  Flutter: [
    'lib/arm64-v8a/libflutter.so',
    'lib/armeabi-v7a/libflutter.so',
    'lib/x86_64/libflutter.so',
    'assets/flutter_assets/'
  ],
  'React Native': [
    'lib/arm64-v8a/libreactnativejni.so',
    'lib/armeabi-v7a/libreactnativejni.so',
    'lib/x86/libreactnativejni.so',
    'lib/x86_64/libreactnativejni.so',
    'assets/index.android.bundle'
  ],
  Xamarin: [
    'assemblies/Xamarin.Android.dll',
    'assemblies/Mono.Android.dll',
    'lib/arm64-v8a/libmonosgen-2.0.so',
    'lib/armeabi-v7a/libmonosgen-2.0.so'
  ],
  Cordova: [
    'assets/www/cordova.js',
    'assets/www/cordova_plugins.js'
  ],
  Unity: [
    'lib/arm64-v8a/libunity.so',
    'lib/armeabi-v7a/libunity.so',
    'assets/bin/Data/'
  ]
}

export type FrameworkMatch = {
  name: string;
  /** Signatures found, sorted */
  evidence: string[];
}

export type FrameworkReport = {
  /** Detected frameworks, sorted by name */
  frameworks: FrameworkMatch[];
  /** Every `.so` entry, sorted */
  nativeLibraries: string[];
}

/**
 * Detects the cross-platform frameworks an APK was built with.
 */
export type FrameworkDetector = {
  /**
   * @throws {ValidationError} If the file cannot be read as a ZIP archive
   */
  detect(apkPath: string): Promise<FrameworkReport>;
}

/**
 * Matches entry names against the framework signatures.
 */
export function matchFrameworks(entries: readonly string[], signatures: Record<string, readonly string[]> = frameworkSignatures): FrameworkReport {
  const names = new Set(entries)
  const frameworks: FrameworkMatch[] = []

  for (const [name, patterns] of Object.entries(signatures)) {
    const evidence = patterns.filter(pattern => pattern.endsWith('/')
      ? entries.some(entry => entry.startsWith(pattern))
      : names.has(pattern))

    if (evidence.length > 0) {
      frameworks.push({name, evidence: [...evidence].sort()})
    }
  }

  frameworks.sort((a, b) => a.name.localeCompare(b.name))
  return {
    frameworks,
    nativeLibraries: entries.filter(entry => entry.endsWith('.so')).sort()
  }
}

/**
 * Lists the entry names of a ZIP archive from its central directory,
 * without extracting anything.
 */
export async function listZipEntries(path: string): Promise<string[]> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, {lazyEntries: true, autoClose: true}, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error(`Cannot open ${path}`))
        return
      }

      const names: string[] = []
      zipfile.on('entry', (entry: yauzl.Entry) => {
        names.push(entry.fileName)
        zipfile.readEntry()
      })
      zipfile.once('end', () => {
        resolve(names)
      })
      zipfile.once('error', reject)
      zipfile.readEntry()
    })
  })
}

/**
 * Detector reading the entry list of the APK with yauzl.
 */
export class ZipFrameworkDetector implements FrameworkDetector {
  async detect(apkPath: string): Promise<FrameworkReport> {
    let entries: string[]
    try {
      entries = await listZipEntries(apkPath)
    } catch (error) {
      throw new ValidationError(`Invalid APK (not a valid ZIP file): ${apkPath}`, {cause: error})
    }

    return matchFrameworks(entries)
  }
}

export type FrameworkAnalysis = {
  apkPath: string;
  frameworks: FrameworkMatch[];
  /** Every `.so` entry, sorted; absent when the listing was not requested */
  nativeLibraries?: string[];
}

export type AnalyzeOptions = {
  /** Include the native library listing (default true) */
  nativeLibraries?: boolean;
}

/**
 * Checks that a file is an APK, then reports the frameworks it was built
 * with and, unless disabled, its native libraries.
 * @throws {ValidationError} If the file is not an APK or cannot be read as one
 */
export async function analyzeApk(apkPath: string, options: AnalyzeOptions = {}, detector: FrameworkDetector = new ZipFrameworkDetector()): Promise<FrameworkAnalysis> {
  const path = resolve(apkPath)
  await checkGates(apkGates(path))
  const {frameworks, nativeLibraries} = await detector.detect(path)
  return options.nativeLibraries === false
    ? {apkPath: path, frameworks}
    : {apkPath: path, frameworks, nativeLibraries}
}
