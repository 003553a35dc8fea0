import { defineCommand, showUsage, type ArgsDef, type ParsedArgs } from 'citty'
import boxen from 'boxen'
import chalk from 'chalk'
import { ConfigManager } from '../core/config.js'
import { DEFAULT_VERSION_FILES } from '../core/file-walker.js'
import { createVersionPattern } from '../core/version-pattern.js'
import { VersionUpdateService, type UpdateOptions } from '../core/version-update.js'
import {
  AsmVerError,
  AttributeChoiceSchema,
  ComponentValueSchema,
  QuoteStyleSchema,
  type AsmVerConfig,
  type ComponentValues,
  type UpdateSummary,
} from '../core/types.js'
import consola, { cliLogger, configureLogging, operation } from '../utils/logger.js'
import { readPackageInfo } from '../utils/package-info.js'
import { setupAbortHandler } from '../utils/signals.js'

const { name, version, description } = readPackageInfo()

const updateArgs = {
  directory: {
    type: 'positional',
    description: 'Root directory; it and all of its subdirectories are searched for version files',
    required: true,
  },
  buildNumber: {
    type: 'positional',
    description: 'Build number to set in the version declarations (non-negative integer)',
    required: true,
  },
  attributes: {
    type: 'string',
    description: 'Attributes to update: AssemblyVersion (a), AssemblyFileVersion (f) or both (b). Default b',
    alias: 'a',
  },
  files: {
    type: 'string',
    description: `Comma-separated file names or globs to update. Default ${DEFAULT_VERSION_FILES.join(',')}`,
  },
  'file-ending': {
    type: 'string',
    description: 'Also update files whose names end with this text, e.g. AssemblyInfo.vb',
    alias: 'f',
  },
  major: {
    type: 'string',
    description: 'Also set the major component',
  },
  minor: {
    type: 'string',
    description: 'Also set the minor component',
  },
  revision: {
    type: 'string',
    description: 'Also set the revision component',
  },
  quotes: {
    type: 'string',
    description: 'Quote style to accept around versions: double or any. Default double',
  },
  exclude: {
    type: 'string',
    description: 'Comma-separated directory names to skip, e.g. bin,obj',
  },
  'dry-run': {
    type: 'boolean',
    description: 'Preview changes without writing files',
    alias: 'd',
  },
  strict: {
    type: 'boolean',
    description: 'Fail when no version declaration is found',
  },
  config: {
    type: 'string',
    description: 'Path to configuration file',
    alias: 'c',
  },
  verbose: {
    type: 'boolean',
    description: 'Enable verbose output',
    alias: 'v',
  },
  quiet: {
    type: 'boolean',
    description: 'Only show warnings and errors',
    alias: 'q',
  },
} as const satisfies ArgsDef

/**
 * Raw command-line values before validation
 */
export interface UpdateArgs {
  directory?: string
  buildNumber?: string
  attributes?: string
  files?: string
  'file-ending'?: string
  major?: string
  minor?: string
  revision?: string
  quotes?: string
  exclude?: string
  'dry-run'?: boolean
  strict?: boolean
}

/**
 * Fully resolved run settings
 */
export interface ResolvedUpdate extends UpdateOptions {
  strict: boolean
}

function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(Boolean)
}

function parseComponent(label: string, value: string): number {
  const result = ComponentValueSchema.safeParse(value)
  if (!result.success) {
    throw new AsmVerError(`Invalid ${label} "${value}": ${result.error.issues[0]?.message ?? 'expected a non-negative integer'}`, 'INVALID_ARGUMENT')
  }
  return result.data
}

function parseOptionalComponent(label: string, value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseComponent(label, value)
}

/**
 * Validate command-line values and merge them over the configuration file.
 * Flags win over configuration, configuration wins over defaults.
 *
 * @throws {AsmVerError} INVALID_ARGUMENT for anything that fails validation
 */
export function resolveUpdateArgs(args: UpdateArgs, config: AsmVerConfig = {}): ResolvedUpdate {
  if (!args.directory) {
    throw new AsmVerError('A root directory is required', 'INVALID_ARGUMENT')
  }

  if (args.buildNumber === undefined) {
    throw new AsmVerError('A build number is required', 'INVALID_ARGUMENT')
  }

  const values: ComponentValues = {
    build: parseComponent('build number', args.buildNumber),
    major: parseOptionalComponent('major', args.major),
    minor: parseOptionalComponent('minor', args.minor),
    revision: parseOptionalComponent('revision', args.revision),
  }

  const attributes = AttributeChoiceSchema.safeParse(args.attributes ?? config.attributes ?? 'b')
  if (!attributes.success) {
    throw new AsmVerError(`Invalid attributes "${args.attributes}": expected a, f or b`, 'INVALID_ARGUMENT')
  }

  const quotes = QuoteStyleSchema.safeParse(args.quotes ?? config.quotes ?? 'double')
  if (!quotes.success) {
    throw new AsmVerError(`Invalid quotes "${args.quotes}": expected double or any`, 'INVALID_ARGUMENT')
  }

  const files = args.files !== undefined ? splitList(args.files) : config.files
  if (files && files.length === 0) {
    throw new AsmVerError('--files needs at least one file name', 'INVALID_ARGUMENT')
  }

  return {
    root: args.directory,
    values,
    pattern: createVersionPattern({ attributes: attributes.data, quotes: quotes.data }),
    files,
    fileEnding: args['file-ending'] || config.fileEnding,
    exclude: args.exclude !== undefined ? splitList(args.exclude) : config.exclude,
    dryRun: args['dry-run'] ?? false,
    strict: Boolean(args.strict || config.strict),
  }
}

/**
 * Exit code for a finished run: 1 on any per-file error, on cancellation,
 * or in strict mode when nothing matched; 0 otherwise
 */
export function resolveExitCode(summary: UpdateSummary, strict: boolean): number {
  if (summary.errors.length > 0 || summary.cancelled) return 1
  if (strict && summary.filesMatched === 0) return 1
  return 0
}

/**
 * Display the planned changes of a dry run
 */
function displayDryRunSummary(summary: UpdateSummary) {
  console.log(`\n${chalk.bold('asmver preview')} ${chalk.gray(summary.root)}`)

  for (const result of summary.results.filter(r => r.changes.length > 0)) {
    console.log(`\n  ${chalk.blue(result.filePath)}:`)
    for (const change of result.changes) {
      console.log(`    ${chalk.gray(`${change.attribute} ${change.component} (line ${change.lineNumber})`)}:`)
      console.log(`      ${chalk.red('- ' + change.oldValue)}`)
      console.log(`      ${chalk.green('+ ' + change.newValue)}`)
    }
  }

  console.log('\n✅ Dry run complete - no changes made')
}

/**
 * Display the run totals and any errors
 */
function displaySummary(summary: UpdateSummary) {
  const stats = [
    `Files scanned: ${chalk.cyan(summary.filesScanned)}`,
    `Files matched: ${chalk.blue(summary.filesMatched)}`,
    `Files ${summary.dryRun ? 'to modify' : 'modified'}: ${chalk.green(summary.filesModified)}`,
    `Errors: ${summary.errors.length > 0 ? chalk.red(summary.errors.length) : chalk.gray(0)}`,
  ].join('\n')

  console.log(boxen(stats, {
    title: `Build ${summary.buildNumber}`,
    padding: 1,
    margin: { top: 1, bottom: 0, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: summary.errors.length > 0 ? 'red' : 'green',
  }))

  if (!summary.dryRun) {
    for (const result of summary.results.filter(r => r.modified)) {
      cliLogger.success(`Updated ${result.filePath}`)
    }
  }

  for (const error of summary.errors) {
    cliLogger.error(`${error.filePath}: ${error.message}`)
  }
}

async function runUpdate(args: ParsedArgs<typeof updateArgs>): Promise<void> {
  configureLogging({ verbose: args.verbose, quiet: args.quiet })

  let resolved: ResolvedUpdate
  try {
    const config = await new ConfigManager({ configPath: args.config }).load()
    resolved = resolveUpdateArgs(args, config)
  } catch (error) {
    if (error instanceof AsmVerError && error.code === 'INVALID_ARGUMENT') {
      await showUsage(updateCommand)
    }
    consola.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  }

  let summary: UpdateSummary
  const abort = setupAbortHandler()
  try {
    operation.start(`${resolved.dryRun ? 'Previewing' : 'Setting'} build number ${resolved.values.build}`)
    summary = await new VersionUpdateService().run({ ...resolved, signal: abort.signal })
  } catch (error) {
    operation.fail('Update failed')
    consola.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  } finally {
    abort.dispose()
  }

  if (summary.dryRun) {
    displayDryRunSummary(summary)
  }
  displaySummary(summary)

  if (summary.filesMatched === 0) {
    const message = `No version declarations found under ${summary.root}; check the directory and file name filters`
    if (resolved.strict) {
      operation.fail(message)
    } else {
      operation.warn(message)
    }
  }

  process.exit(resolveExitCode(summary, resolved.strict))
}

export const updateCommand = defineCommand({
  meta: {
    name,
    version,
    description,
  },
  args: updateArgs,
  run: ({ args }) => runUpdate(args),
})
