import {basename, join} from 'node:path'
import {listFiles} from '../engine/gates.js'
import {ValidationError} from '../errors.js'
import type {SplitArtifacts} from '../types.js'

/** Filename fragment that marks a configuration or feature split. */
export const splitMarker = 'split_'

export function isSplitName(path: string): boolean {
  return basename(path).includes(splitMarker)
}

/**
 * Classifies the APK files of one application.
 *
 * The first file without the split marker is the base; any further
 * unmarked file is treated as a split. When every file carries the marker,
 * the first one stands in as the base.
 *
 * @throws {ValidationError} If the list is empty
 */
export function classifySplits(paths: readonly string[]): SplitArtifacts {
  if (paths.length === 0) {
    throw new ValidationError('A split application needs at least one APK file')
  }

  const baseIndex = paths.findIndex(path => !isSplitName(path))
  const index = baseIndex === -1 ? 0 : baseIndex
  return {
    base: paths[index],
    splits: paths.filter((_, i) => i !== index)
  }
}

/**
 * Lists the `.apk` files directly inside a directory, in name order, and
 * classifies them. Paths listed in `except` (such as a previous merge output
 * kept in the same directory) are left out.
 * @throws {ValidationError} If the directory holds no other APK
 */
export async function readSplitDirectory(dir: string, {except = []}: {except?: readonly string[]} = {}): Promise<SplitArtifacts> {
  const paths = (await listFiles(dir, '.apk'))
    .map(name => join(dir, name))
    .filter(path => !except.includes(path))
  if (paths.length === 0) {
    throw new ValidationError(`No .apk files found in ${dir}`)
  }

  return classifySplits(paths)
}
