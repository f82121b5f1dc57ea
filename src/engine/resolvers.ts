import {constants} from 'node:fs'
import {access, stat} from 'node:fs/promises'
import {delimiter, join, resolve} from 'node:path'
import {homedir} from 'node:os'

/**
 * One strategy for locating a tool. Resolves to the command prefix
 * (executable plus leading arguments) or undefined when it has nothing.
 */
export type ToolResolver = () => Promise<string[] | undefined>

/**
 * Tries resolvers in priority order; the first non-empty result wins.
 */
export async function resolveFirst(resolvers: readonly ToolResolver[]): Promise<string[] | undefined> {
  for (const resolver of resolvers) {
    const command = await resolver()
    if (command && command.length > 0) {
      return command
    }
  }

  return undefined
}

/**
 * Expands a leading `~` to the home directory and resolves the path.
 */
export function expandHome(value: string): string {
  if (value === '~' || value.startsWith('~/')) {
    return resolve(join(homedir(), value.slice(1)))
  }

  return resolve(value)
}

export async function isExecutable(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    if (!stats.isFile()) {
      return false
    }

    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

export async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

export async function isDirectoryPath(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Looks up an executable in the directories of a PATH-like string.
 * On Windows, `extensions` lists the suffixes to try (e.g., `.bat`, `.exe`).
 */
export async function findInPath(binName: string, pathValue: string | undefined, extensions: readonly string[] = ['']): Promise<string | undefined> {
  const entries = (pathValue ?? '')
    .split(delimiter)
    .map(v => v.trim())
    .filter(Boolean)

  for (const entry of entries) {
    for (const extension of extensions) {
      const candidate = join(entry, binName + extension)
      if (await isExecutable(candidate)) {
        return candidate
      }
    }
  }

  return undefined
}

/** Resolver that finds a binary on PATH. */
export function fromPath(binName: string, pathValue: string | undefined, extensions?: readonly string[]): ToolResolver {
  return async () => {
    const found = await findInPath(binName, pathValue, extensions)
    return found ? [found] : undefined
  }
}

/** Resolver that returns a fixed command when a value is configured. */
export function fromValue(value: string | undefined, toCommand: (value: string) => Promise<string[] | undefined>): ToolResolver {
  return async () => (value ? toCommand(value) : undefined)
}
