/**
 * Programmatic entry point for asmver
 *
 * @example
 * ```typescript
 * import { VersionUpdateService, createVersionPattern } from 'asmver'
 *
 * const summary = await new VersionUpdateService().run({
 *   root: process.env.BUILD_SOURCESDIRECTORY ?? '.',
 *   values: { build: Number(process.env.BUILD_BUILDID) },
 *   pattern: createVersionPattern({ attributes: 'b' }),
 * })
 * ```
 */

export { ConfigManager, type ConfigOptions } from './core/config.js'
export {
  DEFAULT_VERSION_FILES,
  assertDirectory,
  createFileNameMatcher,
  walkVersionFiles,
  type WalkOptions,
} from './core/file-walker.js'
export { decodeFileRecord, encodeFileRecord, readFileRecord, writeFileRecord } from './core/version-file.js'
export {
  attributeKindsFor,
  createVersionPattern,
  findVersionDeclarations,
  type VersionPattern,
  type VersionPatternOptions,
} from './core/version-pattern.js'
export { applyVersionUpdates, formatComponent, type SubstitutionResult } from './core/version-substitution.js'
export { VersionUpdateService, type UpdateOptions } from './core/version-update.js'
export * from './core/types.js'
