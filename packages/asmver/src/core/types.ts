/**
 * Type definitions and validation schemas for asmver
 *
 * This module contains the data model shared by the walker, matcher,
 * substitution engine and file writer, the Zod schemas used to validate
 * configuration files and command-line input, and the custom error class.
 *
 * @fileoverview Core type definitions for assembly version stamping
 */

import { z } from 'zod'

/**
 * The two attribute kinds that carry a four-part assembly version
 */
export const ATTRIBUTE_KINDS = ['AssemblyVersion', 'AssemblyFileVersion'] as const

export type AttributeKind = typeof ATTRIBUTE_KINDS[number]

/**
 * Names of the four dot-separated components, in declaration order
 */
export const VERSION_COMPONENTS = ['major', 'minor', 'build', 'revision'] as const

export type VersionComponent = typeof VERSION_COMPONENTS[number]

/**
 * Attribute selection shorthand: AssemblyVersion (a), AssemblyFileVersion (f) or both (b)
 */
export const AttributeChoiceSchema = z.enum(['a', 'f', 'b'], {
  errorMap: () => ({ message: 'Attribute choice must be one of a, f or b' }),
})

export type AttributeChoice = z.infer<typeof AttributeChoiceSchema>

/**
 * Quote styles accepted around the version literal
 */
export const QuoteStyleSchema = z.enum(['double', 'any'], {
  errorMap: () => ({ message: 'Quote style must be either double or any' }),
})

export type QuoteStyle = z.infer<typeof QuoteStyleSchema>

/**
 * Zod schema for a non-negative version component value supplied by the user.
 * Accepts numbers and numeric strings, since citty hands every argument over as a string.
 */
export const ComponentValueSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a non-negative integer')])
  .pipe(z.coerce.number().int('Expected a non-negative integer').nonnegative('Expected a non-negative integer').max(Number.MAX_SAFE_INTEGER))

/**
 * Zod schema for the configuration file (asmver.config.*, .asmverrc)
 */
export const AsmVerConfigSchema = z.object({
  files: z.array(z.string().min(1, 'File pattern cannot be empty')).min(1, 'At least one file pattern is required').optional(),
  fileEnding: z.string().min(1, 'File ending cannot be empty').optional(),
  attributes: AttributeChoiceSchema.optional(),
  quotes: QuoteStyleSchema.optional(),
  exclude: z.array(z.string()).optional(),
  strict: z.boolean().optional(),
})

/**
 * Configuration loaded from disk
 */
export type AsmVerConfig = z.infer<typeof AsmVerConfigSchema>

/**
 * Replacement values for the version components. Build is always set;
 * the other three are only changed when given.
 */
export interface ComponentValues {
  major?: number
  minor?: number
  build: number
  revision?: number
}

/**
 * A character span within a file's decoded text, end exclusive
 */
export interface TextSpan {
  start: number
  end: number
}

/**
 * One component of a matched declaration
 */
export interface DeclarationComponent {
  /** Component text exactly as written: digits (possibly zero-padded) or '*' */
  text: string
  /** Location of the component text */
  span: TextSpan
}

/**
 * A version declaration found in a file, e.g. `AssemblyVersion("1.2.0.0")`
 */
export interface VersionDeclaration {
  /** Which of the recognized attributes this is */
  kind: AttributeKind
  /** Attribute name as written, including any namespace or `Attribute` suffix */
  attributeName: string
  /** The four components, keyed by name */
  components: Record<VersionComponent, DeclarationComponent>
  /** Span of the whole statement from the attribute name to the closing parenthesis */
  span: TextSpan
  /** 1-based line the statement starts on */
  line: number
}

/**
 * Text encodings recognized when reading version files
 */
export type FileEncoding = 'utf8' | 'utf16le' | 'latin1'

/**
 * A file loaded for processing
 */
export interface FileRecord {
  /** Absolute path */
  path: string
  /** Decoded text, without any byte-order mark */
  text: string
  /** Encoding the text was decoded with */
  encoding: FileEncoding
  /** Byte-order mark the file started with, or null when there was none */
  bom: Buffer | null
  /** Bytes as read from disk */
  raw: Buffer
}

/**
 * A single component substitution
 */
export interface VersionChange {
  /** Attribute name as written in the file */
  attribute: string
  /** Component that changed */
  component: VersionComponent
  /** Previous component text */
  oldValue: string
  /** New component text */
  newValue: string
  /** 1-based line number of the declaration */
  lineNumber: number
}

/**
 * Outcome of processing one file
 */
export interface FileUpdateResult {
  /** Path relative to the root directory */
  filePath: string
  /** Number of declarations found */
  matched: number
  /** Whether the file was changed (or would be, in dry-run mode) */
  modified: boolean
  /** Component substitutions made in this file */
  changes: VersionChange[]
  /** Set when the file could not be read or written */
  error?: { code: AsmVerErrorCode; message: string }
}

/**
 * Summary of a complete run
 */
export interface UpdateSummary {
  /** Absolute root directory */
  root: string
  /** Build number that was applied */
  buildNumber: number
  /** Whether the run only previewed changes */
  dryRun: boolean
  /** Number of recognized files visited */
  filesScanned: number
  /** Number of files with at least one declaration */
  filesMatched: number
  /** Number of files changed (or that would change) */
  filesModified: number
  /** Whether the run stopped early because it was cancelled */
  cancelled: boolean
  /** Per-file outcomes in walk order */
  results: FileUpdateResult[]
  /** Every read, write and traversal error encountered */
  errors: Array<{ filePath: string; code: AsmVerErrorCode; message: string }>
}

/**
 * Machine-readable error codes
 */
export type AsmVerErrorCode =
  | 'PATH_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'INVALID_ARGUMENT'
  | 'INVALID_CONFIG'

/**
 * Custom error class for asmver operations
 *
 * Provides structured error handling with error codes and an optional
 * file path for context.
 *
 * @example
 * ```typescript
 * throw new AsmVerError(
 *   'Failed to write file',
 *   'WRITE_ERROR',
 *   '/src/Properties/AssemblyInfo.cs',
 *   { cause: error }
 * )
 * ```
 */
export class AsmVerError extends Error {
  /**
   * Create a new AsmVerError
   *
   * @param message - Human-readable error message
   * @param code - Machine-readable error code for categorization
   * @param filePath - Optional path of the file or directory involved
   * @param options - Standard error options, used to attach the underlying cause
   */
  constructor(
    message: string,
    public code: AsmVerErrorCode,
    public filePath?: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'AsmVerError'
  }
}
