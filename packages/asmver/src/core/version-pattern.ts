/**
 * Version declaration matching
 *
 * Finds `AssemblyVersion("1.2.3.4")` and `AssemblyFileVersion("1.2.3.4")`
 * statements in C#, VB.NET and F# sources. Only the exact four-component
 * form is accepted; anything else is ignored rather than reported.
 */

import {
  ATTRIBUTE_KINDS,
  VERSION_COMPONENTS,
  type AttributeChoice,
  type AttributeKind,
  type DeclarationComponent,
  type QuoteStyle,
  type TextSpan,
  type VersionComponent,
  type VersionDeclaration,
} from './types.js'

/**
 * Options for building a {@link VersionPattern}
 */
export interface VersionPatternOptions {
  /** Which attributes to match: AssemblyVersion (a), AssemblyFileVersion (f) or both (b). Default `b` */
  attributes?: AttributeChoice
  /** Accept only double quotes (default) or single quotes as well */
  quotes?: QuoteStyle
}

/**
 * Compiled, read-only matching configuration shared by every file in a run
 */
export interface VersionPattern {
  readonly kinds: readonly AttributeKind[]
  readonly quotes: QuoteStyle
  readonly regex: RegExp
}

const COMPONENT = String.raw`\d+|\*`

/**
 * Resolve an attribute choice to the attribute kinds it selects
 */
export function attributeKindsFor(choice: AttributeChoice): AttributeKind[] {
  switch (choice) {
    case 'a':
      return ['AssemblyVersion']
    case 'f':
      return ['AssemblyFileVersion']
    case 'b':
      return [...ATTRIBUTE_KINDS]
  }
}

/**
 * Compile the version pattern once for a run
 *
 * @example
 * ```typescript
 * const pattern = createVersionPattern({ attributes: 'f' })
 * findVersionDeclarations('[assembly: AssemblyFileVersion("1.0.0.0")]', pattern)
 * ```
 */
export function createVersionPattern(options: VersionPatternOptions = {}): VersionPattern {
  const kinds = attributeKindsFor(options.attributes ?? 'b')
  const quotes = options.quotes ?? 'double'
  const quote = quotes === 'any' ? `["']` : `"`

  const source = [
    // Optional namespace qualification, never starting mid-identifier
    String.raw`(?<name>(?<![\w.])(?:[A-Za-z_]\w*\.)*(?<kind>${kinds.join('|')})(?:Attribute)?)`,
    String.raw`\s*\(\s*(?<quote>${quote})`,
    VERSION_COMPONENTS.map(component => `(?<${component}>${COMPONENT})`).join(String.raw`\.`),
    String.raw`\k<quote>\s*\)`,
  ].join('')

  return Object.freeze({
    kinds: Object.freeze(kinds),
    quotes,
    regex: new RegExp(source, 'gid'),
  })
}

function canonicalKind(written: string): AttributeKind | undefined {
  const lowered = written.toLowerCase()
  return ATTRIBUTE_KINDS.find(kind => kind.toLowerCase() === lowered)
}

function groupSpan(match: RegExpMatchArray, group: string): TextSpan | undefined {
  const range = match.indices?.groups?.[group]
  return range ? { start: range[0], end: range[1] } : undefined
}

/**
 * Find every version declaration in a file's text, in document order
 *
 * @returns Matched declarations; an empty array when the text has none
 */
export function findVersionDeclarations(text: string, pattern: VersionPattern): VersionDeclaration[] {
  const declarations: VersionDeclaration[] = []
  let line = 1
  let scannedTo = 0

  // matchAll works on a copy of the regex, so the shared pattern keeps no state
  for (const match of text.matchAll(pattern.regex)) {
    const groups = match.groups
    const nameSpan = groupSpan(match, 'name')
    const kind = groups ? canonicalKind(groups.kind) : undefined
    if (!groups || !nameSpan || !kind || match.index === undefined) {
      continue
    }

    const components: Partial<Record<VersionComponent, DeclarationComponent>> = {}
    for (const component of VERSION_COMPONENTS) {
      const span = groupSpan(match, component)
      if (span) {
        components[component] = { text: groups[component], span }
      }
    }
    const { major, minor, build, revision } = components
    if (!major || !minor || !build || !revision) {
      continue
    }

    for (let i = scannedTo; i < nameSpan.start; i++) {
      if (text.charCodeAt(i) === 10) line++
    }
    scannedTo = nameSpan.start

    declarations.push({
      kind,
      attributeName: groups.name,
      components: { major, minor, build, revision },
      span: { start: nameSpan.start, end: match.index + match[0].length },
      line,
    })
  }

  return declarations
}
