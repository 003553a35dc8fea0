import { readFileSync } from 'fs'
import { destr } from 'destr'
import { z } from 'zod'

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().default(''),
})

export type PackageInfo = z.infer<typeof PackageInfoSchema>

/**
 * Read name, version and description from the package manifest.
 * The manifest sits one level above both src/ and dist/.
 */
export function readPackageInfo(manifestUrl = new URL('../../package.json', import.meta.url)): PackageInfo {
  return PackageInfoSchema.parse(destr(readFileSync(manifestUrl, 'utf-8')))
}
