import { readdir, realpath, stat } from 'fs/promises'
import type { Dirent, Stats } from 'fs'
import { basename, join, resolve } from 'pathe'
import { minimatch } from 'minimatch'
import { fileLogger } from '../utils/logger.js'
import { AsmVerError } from './types.js'

/**
 * File names that carry assembly version declarations in a typical .NET solution
 */
export const DEFAULT_VERSION_FILES = ['AssemblyInfo.cs', 'CommonAssemblyInfo.cs']

/**
 * Options controlling which files the walker yields
 */
export interface WalkOptions {
  /** Base names or glob patterns to match, case-insensitively (default: {@link DEFAULT_VERSION_FILES}) */
  files?: string[]
  /** Additional case-insensitive suffix a base name may end with, e.g. `AssemblyInfo.vb` */
  fileEnding?: string
  /** Directory names not to descend into, case-insensitively (default: none) */
  exclude?: string[]
  /** Called when a directory below the root cannot be listed; the walk continues */
  onError?: (dirPath: string, error: unknown) => void
  /** Nothing further is yielded or entered once aborted */
  signal?: AbortSignal
}

/**
 * Predicate deciding whether a base name is a version file
 */
export type FileNameMatcher = (fileName: string) => boolean

/**
 * Build the base-name predicate used by {@link walkVersionFiles}
 */
export function createFileNameMatcher(options: Pick<WalkOptions, 'files' | 'fileEnding'> = {}): FileNameMatcher {
  const patterns = options.files ?? DEFAULT_VERSION_FILES
  const ending = options.fileEnding?.toLowerCase()

  return (fileName: string) => {
    if (ending && fileName.toLowerCase().endsWith(ending)) {
      return true
    }
    return patterns.some(pattern => minimatch(fileName, pattern, { nocase: true, dot: true }))
  }
}

/**
 * Ensure the walk root exists and is a directory
 *
 * @returns The absolute root path
 * @throws {AsmVerError} PATH_NOT_FOUND or NOT_A_DIRECTORY
 */
export async function assertDirectory(root: string): Promise<string> {
  const absoluteRoot = resolve(root)

  let stats: Stats
  try {
    stats = await stat(absoluteRoot)
  } catch (error) {
    throw new AsmVerError(`The specified directory does not exist: ${root}`, 'PATH_NOT_FOUND', absoluteRoot, { cause: error })
  }

  if (!stats.isDirectory()) {
    throw new AsmVerError(`The specified path is not a directory: ${root}`, 'NOT_A_DIRECTORY', absoluteRoot)
  }

  return absoluteRoot
}

/**
 * Recursively yield every version file below a root directory
 *
 * Entries are visited in name order. Symbolically linked directories are
 * followed, but each directory is entered at most once, keyed by its real
 * path, so link cycles terminate.
 *
 * @example
 * ```typescript
 * for await (const filePath of walkVersionFiles('./src', { fileEnding: 'AssemblyInfo.vb' })) {
 *   console.log(filePath)
 * }
 * ```
 */
export async function* walkVersionFiles(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const absoluteRoot = await assertDirectory(root)
  const isVersionFile = createFileNameMatcher(options)
  const excluded = new Set((options.exclude ?? []).map(name => name.toLowerCase()))
  const visited = new Set<string>()

  async function* visit(dirPath: string): AsyncGenerator<string> {
    let entries: Dirent[]
    try {
      const canonical = await realpath(dirPath)
      if (visited.has(canonical)) {
        fileLogger.debug(`Skipping already visited directory ${dirPath}`)
        return
      }
      visited.add(canonical)
      entries = await readdir(dirPath, { withFileTypes: true })
    } catch (error) {
      if (dirPath === absoluteRoot) {
        throw new AsmVerError(`Failed to read directory: ${dirPath}`, 'READ_ERROR', dirPath, { cause: error })
      }
      fileLogger.warn(`Cannot read directory ${dirPath}`)
      options.onError?.(dirPath, error)
      return
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      if (options.signal?.aborted) {
        return
      }

      const fullPath = join(dirPath, entry.name)
      let isDirectory = entry.isDirectory()
      let isFile = entry.isFile()

      if (entry.isSymbolicLink()) {
        try {
          const target = await stat(fullPath)
          isDirectory = target.isDirectory()
          isFile = target.isFile()
        } catch {
          fileLogger.debug(`Ignoring dangling link ${fullPath}`)
          continue
        }
      }

      if (isDirectory) {
        if (!excluded.has(entry.name.toLowerCase())) {
          yield* visit(fullPath)
        }
      } else if (isFile && isVersionFile(basename(fullPath))) {
        yield fullPath
      }
    }
  }

  yield* visit(absoluteRoot)
}
