import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {isAbsolute, join, normalize} from 'node:path'
import {StagingError} from '../errors.js'

/**
 * Exclusively-owned temporary directory scoped to one pipeline run.
 *
 * Holds intermediate artifacts (the built-but-unaligned APK, the
 * aligned-but-unsigned APK, a decoded project). Anything that must outlive
 * the run is copied to a caller-supplied path before the area is torn down.
 */
export class StagingArea {
  constructor(readonly path: string) {}

  /**
   * Resolves a path inside the staging area.
   * @param name - Relative file or directory name
   * @throws {StagingError} If the name is absolute or escapes the area
   */
  file(name: string): string {
    const normalized = normalize(name)
    if (isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../') || normalized.startsWith('..\\')) {
      throw new StagingError(`Invalid staging path: ${name}. Path traversal is not allowed.`)
    }

    return join(this.path, normalized)
  }
}

export type StagingOptions = {
  /** Parent directory of the staging area (defaults to the OS temp directory) */
  root?: string;
}

/**
 * Creates a uniquely-named staging area, runs `fn` with it and removes the
 * area recursively on every exit path: normal return, early return or thrown
 * error. A removal failure never hides the error thrown by `fn`.
 *
 * @example
 * ```typescript
 * await withStagingArea('droidsmith-build-', async staging => {
 *   const built = staging.file('built.apk')
 *   // ... run tools writing into the area ...
 *   await copyFile(built, outputPath)
 * })
 * ```
 */
export async function withStagingArea<T>(prefix: string, fn: (area: StagingArea) => Promise<T>, options: StagingOptions = {}): Promise<T> {
  let path: string
  try {
    path = await mkdtemp(join(options.root ?? tmpdir(), prefix))
  } catch (error) {
    throw new StagingError(`Failed to create staging area with prefix ${prefix}`, {cause: error})
  }

  let result: T
  try {
    result = await fn(new StagingArea(path))
  } catch (error) {
    await rm(path, {recursive: true, force: true}).catch(() => undefined)
    throw error
  }

  try {
    await rm(path, {recursive: true, force: true})
  } catch (error) {
    throw new StagingError(`Failed to remove staging area ${path}`, {cause: error})
  }

  return result
}
