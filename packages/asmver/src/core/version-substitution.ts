import {
  VERSION_COMPONENTS,
  type ComponentValues,
  type TextSpan,
  type VersionChange,
  type VersionDeclaration,
} from './types.js'

/**
 * Result of substituting values into a file's text
 */
export interface SubstitutionResult {
  /** Updated text */
  content: string
  /** Whether any component changed */
  modified: boolean
  /** Changes in document order */
  changes: VersionChange[]
}

interface Edit {
  span: TextSpan
  replacement: string
}

/**
 * Format a new component value the way the original was written.
 * Zero-padded originals (`007`) keep their width; everything else,
 * wildcards included, gets the plain decimal form.
 */
export function formatComponent(original: string, value: number): string {
  const digits = String(value)
  return /^0\d+$/.test(original) ? digits.padStart(original.length, '0') : digits
}

/**
 * Replace the targeted components of every declaration
 *
 * Edits are applied from the end of the text towards the start, so the
 * spans recorded by the matcher stay valid whatever the replacement lengths.
 * Components without a value in `values` are copied unchanged.
 *
 * @example
 * ```typescript
 * const text = '[assembly: AssemblyVersion("1.2.0.*")]'
 * const { content } = applyVersionUpdates(text, findVersionDeclarations(text, pattern), { build: 500 })
 * // '[assembly: AssemblyVersion("1.2.500.*")]'
 * ```
 */
export function applyVersionUpdates(
  text: string,
  declarations: VersionDeclaration[],
  values: ComponentValues
): SubstitutionResult {
  const edits: Edit[] = []
  const changes: VersionChange[] = []

  for (const declaration of declarations) {
    for (const component of VERSION_COMPONENTS) {
      const value = values[component]
      if (value === undefined) continue

      const current = declaration.components[component]
      const replacement = formatComponent(current.text, value)
      if (replacement === current.text) continue

      edits.push({ span: current.span, replacement })
      changes.push({
        attribute: declaration.attributeName,
        component,
        oldValue: current.text,
        newValue: replacement,
        lineNumber: declaration.line,
      })
    }
  }

  let content = text
  for (const edit of [...edits].sort((a, b) => b.span.start - a.span.start)) {
    content = content.slice(0, edit.span.start) + edit.replacement + content.slice(edit.span.end)
  }

  return { content, modified: edits.length > 0, changes }
}
