import {open, readdir, stat} from 'node:fs/promises'
import {extname, join} from 'node:path'
import {ValidationError} from '../errors.js'

/** ZIP local file header signature, the first four bytes of every APK. */
export const zipLocalFileHeader = Buffer.from([0x50, 0x4B, 0x03, 0x04])

/**
 * Precondition over a filesystem artifact, evaluated before a stage starts
 * any process. `check()` resolves to a failure message, or undefined when the
 * precondition holds.
 */
export type ValidationGate = {
  description: string;
  check(): Promise<string | undefined>;
}

async function statOrUndefined(path: string) {
  try {
    return await stat(path)
  } catch {
    return undefined
  }
}

export function pathExists(path: string, label = 'Path'): ValidationGate {
  return {
    description: `${label} exists`,
    async check() {
      const stats = await statOrUndefined(path)
      return stats ? undefined : `${label} not found: ${path}`
    }
  }
}

export function isFile(path: string): ValidationGate {
  return {
    description: 'is a file',
    async check() {
      const stats = await statOrUndefined(path)
      return stats?.isFile() ? undefined : `Not a file: ${path}`
    }
  }
}

export function isDirectory(path: string): ValidationGate {
  return {
    description: 'is a directory',
    async check() {
      const stats = await statOrUndefined(path)
      return stats?.isDirectory() ? undefined : `Not a directory: ${path}`
    }
  }
}

export function hasExtension(path: string, extension: string): ValidationGate {
  return {
    description: `has ${extension} extension`,
    async check() {
      return extname(path).toLowerCase() === extension.toLowerCase()
        ? undefined
        : `Not a ${extension} file (expected ${extension} extension): ${path}`
    }
  }
}

/**
 * Reads the first four bytes of a file and compares them with the ZIP local
 * file header.
 */
export function zipHeader(path: string): ValidationGate {
  return {
    description: 'starts with a ZIP header',
    async check() {
      let header: Buffer
      try {
        const handle = await open(path, 'r')
        try {
          const buffer = Buffer.alloc(zipLocalFileHeader.length)
          const {bytesRead} = await handle.read(buffer, 0, buffer.length, 0)
          header = buffer.subarray(0, bytesRead)
        } finally {
          await handle.close()
        }
      } catch (error) {
        return `Failed to read header of ${path}: ${error instanceof Error ? error.message : String(error)}`
      }

      if (header.length < zipLocalFileHeader.length) {
        return `File is too small to be a valid APK: ${path}`
      }

      if (!header.equals(zipLocalFileHeader)) {
        return `Header mismatch in ${path}. Expected: ${zipLocalFileHeader.toString('hex')}, got: ${header.toString('hex')}`
      }

      return undefined
    }
  }
}

/**
 * Requires a marker file inside a directory (e.g., `apktool.yml` in a
 * decoded project).
 */
export function markerFile(dir: string, marker: string): ValidationGate {
  return {
    description: `contains ${marker}`,
    async check() {
      const stats = await statOrUndefined(join(dir, marker))
      return stats?.isFile() ? undefined : `Missing ${marker} in ${dir}`
    }
  }
}

/**
 * Requires at least one file with the given extension directly inside a
 * directory. Paths listed in `except` do not count.
 */
export function containsFiles(dir: string, extension: string, {except = []}: {except?: readonly string[]} = {}): ValidationGate {
  return {
    description: `contains ${extension} files`,
    async check() {
      const files = (await listFiles(dir, extension)).filter(name => !except.includes(join(dir, name)))
      return files.length > 0 ? undefined : `No ${extension} files found in ${dir}`
    }
  }
}

/**
 * Lists the files with the given extension directly inside a directory,
 * sorted by name.
 */
export async function listFiles(dir: string, extension: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, {withFileTypes: true})
    return entries
      .filter(e => e.isFile() && extname(e.name).toLowerCase() === extension.toLowerCase())
      .map(e => e.name)
      .sort()
  } catch {
    return []
  }
}

/**
 * Evaluates gates in order and throws on the first one that fails.
 * @throws {ValidationError} Naming the failing precondition
 */
export async function checkGates(gates: readonly ValidationGate[]): Promise<void> {
  for (const gate of gates) {
    const failure = await gate.check()
    if (failure !== undefined) {
      throw new ValidationError(failure)
    }
  }
}

/** Gates every APK input goes through: existence, file type, extension and optionally the ZIP header. */
export function apkGates(path: string, {strict = true}: {strict?: boolean} = {}): ValidationGate[] {
  const gates = [pathExists(path, 'APK'), isFile(path), hasExtension(path, '.apk')]
  if (strict) {
    gates.push(zipHeader(path))
  }

  return gates
}
