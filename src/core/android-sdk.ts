import process from 'node:process'
import {readdir} from 'node:fs/promises'
import {homedir} from 'node:os'
import {join} from 'node:path'
import {isDirectoryPath} from '../engine/resolvers.js'

export type SdkLocation = {
  androidHome?: string;
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  home?: string;
}

export const minBuildToolsVersion = '30.0.0'

function defaultLocations(platform: NodeJS.Platform, home: string): string[] {
  switch (platform) {
    case 'darwin': {
      return [join(home, 'Library', 'Android', 'sdk'), '/opt/android-sdk']
    }

    case 'win32': {
      return [join(home, 'AppData', 'Local', 'Android', 'Sdk'), 'C:/Android/sdk']
    }

    default: {
      return [join(home, 'Android', 'Sdk'), join(home, 'android-sdk'), '/opt/android-sdk']
    }
  }
}

/**
 * Finds the Android SDK root: `ANDROID_HOME`, `ANDROID_SDK_ROOT`, the
 * configured `androidHome`, then the platform's usual install locations.
 */
export async function findAndroidHome(location: SdkLocation = {}): Promise<string | undefined> {
  const env = location.env ?? process.env
  const candidates = [
    env.ANDROID_HOME,
    env.ANDROID_SDK_ROOT,
    location.androidHome,
    ...defaultLocations(location.platform ?? process.platform, location.home ?? homedir())
  ]

  for (const candidate of candidates) {
    if (candidate && await isDirectoryPath(candidate)) {
      return candidate
    }
  }

  return undefined
}

/**
 * Parses a dotted numeric version (e.g., 34.0.0). Returns undefined for
 * anything else, such as `.DS_Store` or `35.0.0-rc1`.
 */
export function parseVersion(value: string): number[] | undefined {
  if (!/^\d+(\.\d+)*$/.test(value)) {
    return undefined
  }

  return value.split('.').map(Number)
}

export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) {
      return diff
    }
  }

  return 0
}

/**
 * Returns the newest `build-tools/<version>` directory at or above the
 * minimum version.
 */
export async function findBuildTools(androidHome: string, minVersion = minBuildToolsVersion): Promise<string | undefined> {
  const root = join(androidHome, 'build-tools')
  let names: string[]
  try {
    const entries = await readdir(root, {withFileTypes: true})
    names = entries.filter(e => e.isDirectory()).map(e => e.name)
  } catch {
    return undefined
  }

  const min = parseVersion(minVersion) ?? [0]
  let best: {version: number[]; name: string} | undefined
  for (const name of names) {
    const version = parseVersion(name)
    if (!version || compareVersions(version, min) < 0) {
      continue
    }

    if (!best || compareVersions(version, best.version) > 0) {
      best = {version, name}
    }
  }

  return best ? join(root, best.name) : undefined
}
