import { readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'

const PackageManifestSchema = z.object({
  version: z.string().min(1),
})

/**
 * Reads the version published in the project's package.json.
 * Resolved from this file's directory, which is the same depth
 * under the project root in src/ and dist/.
 */
export function readPackageVersion(manifestPath: string = join(__dirname, '..', '..', 'package.json')): string {
  const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'))
  return PackageManifestSchema.parse(manifest).version
}

export const APP_VERSION = readPackageVersion()
