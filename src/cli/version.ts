import { readFileSync } from 'node:fs'
import { z } from 'zod'

// src/cli and dist/cli sit at the same depth below the package root
const PACKAGE_URL = new URL('../../package.json', import.meta.url)

const PackageSchema = z.object({ version: z.string().min(1) })

export function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(PACKAGE_URL, 'utf-8'))
  return PackageSchema.parse(raw).version
}
