/**
 * Version Update Service - stamps build numbers into version files
 *
 * Walks a source tree, reads each recognized version file, substitutes the
 * requested components into every declaration and writes the file back.
 * Files are processed one at a time; a failure in one file is recorded and
 * the run moves on to the next.
 */

import { relative } from 'pathe'
import { fileLogger, versionLogger } from '../utils/logger.js'
import { assertDirectory, walkVersionFiles, type WalkOptions } from './file-walker.js'
import { readFileRecord, writeFileRecord } from './version-file.js'
import { findVersionDeclarations, type VersionPattern } from './version-pattern.js'
import { applyVersionUpdates } from './version-substitution.js'
import { AsmVerError, type AsmVerErrorCode, type ComponentValues, type FileRecord, type FileUpdateResult, type UpdateSummary } from './types.js'

/**
 * Options for a single run
 */
export interface UpdateOptions extends Omit<WalkOptions, 'onError'> {
  /** Root directory to search */
  root: string
  /** Values to stamp; build is required */
  values: ComponentValues
  /** Compiled declaration pattern */
  pattern: VersionPattern
  /** Report changes without writing files */
  dryRun?: boolean
  /** Stops the run before the next file or directory once aborted */
  signal?: AbortSignal
}

export class VersionUpdateService {
  /**
   * Run the update across a directory tree
   *
   * @returns Summary of scanned, matched and modified files plus any errors
   * @throws {AsmVerError} PATH_NOT_FOUND or NOT_A_DIRECTORY when the root is unusable
   *
   * @example
   * ```typescript
   * const summary = await new VersionUpdateService().run({
   *   root: './src',
   *   values: { build: 7434 },
   *   pattern: createVersionPattern(),
   * })
   * console.log(`${summary.filesModified} of ${summary.filesScanned} files updated`)
   * ```
   */
  async run(options: UpdateOptions): Promise<UpdateSummary> {
    const { values, pattern, dryRun = false, signal } = options
    const root = await assertDirectory(options.root)

    const summary: UpdateSummary = {
      root,
      buildNumber: values.build,
      dryRun,
      filesScanned: 0,
      filesMatched: 0,
      filesModified: 0,
      cancelled: false,
      results: [],
      errors: [],
    }

    versionLogger.debug(`${dryRun ? 'Previewing' : 'Applying'} build number ${values.build} under ${root}`)

    const files = walkVersionFiles(root, {
      files: options.files,
      fileEnding: options.fileEnding,
      exclude: options.exclude,
      signal,
      onError: (dirPath, error) => {
        const message = error instanceof Error ? error.message : String(error)
        summary.errors.push({ filePath: relative(root, dirPath), code: 'READ_ERROR', message: `Failed to read directory: ${message}` })
      },
    })

    for await (const filePath of files) {
      if (signal?.aborted) break

      summary.filesScanned++
      const result = await this.updateFile(root, filePath, options)
      summary.results.push(result)

      if (result.matched > 0) summary.filesMatched++
      if (result.modified) summary.filesModified++
      if (result.error) {
        summary.errors.push({ filePath: result.filePath, code: result.error.code, message: result.error.message })
      }
    }

    if (signal?.aborted) {
      versionLogger.warn('Update cancelled, remaining files were not processed')
      summary.cancelled = true
    }

    return summary
  }

  /**
   * Process one file, capturing read and write failures in the result
   */
  private async updateFile(root: string, filePath: string, options: UpdateOptions): Promise<FileUpdateResult> {
    const displayPath = relative(root, filePath)
    fileLogger.debug(`Scanning ${displayPath}`)

    let record: FileRecord
    try {
      record = await readFileRecord(filePath)
    } catch (error) {
      return { filePath: displayPath, matched: 0, modified: false, changes: [], error: this.toFileError(displayPath, error) }
    }

    const declarations = findVersionDeclarations(record.text, options.pattern)
    if (declarations.length === 0) {
      fileLogger.debug(`No version declarations in ${displayPath}`)
      return { filePath: displayPath, matched: 0, modified: false, changes: [] }
    }

    const { content, modified: changed, changes } = applyVersionUpdates(record.text, declarations, options.values)
    let modified = changed
    if (changed && !options.dryRun) {
      try {
        modified = await writeFileRecord(record, content)
      } catch (error) {
        return { filePath: displayPath, matched: declarations.length, modified: false, changes, error: this.toFileError(displayPath, error) }
      }
    }

    return { filePath: displayPath, matched: declarations.length, modified, changes }
  }

  private toFileError(displayPath: string, error: unknown): { code: AsmVerErrorCode; message: string } {
    if (!(error instanceof AsmVerError)) {
      throw error
    }
    fileLogger.debug(`${displayPath}: ${error.message}`)
    return { code: error.code, message: error.message }
  }
}
