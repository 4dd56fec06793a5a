/**
 * Runtime JSON loader
 *
 * Uses fs.readFileSync so the config files are read the same way under
 * tsx, Vitest and plain Node ESM.
 */

import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

const jsonCache = new Map<string, unknown>()

/**
 * Load a JSON file relative to the config package root. The result is
 * untyped; callers validate it with a schema.
 */
export function loadJson(relativePath: string): unknown {
  if (jsonCache.has(relativePath)) return jsonCache.get(relativePath)

  const fullPath = join(__dirname, relativePath)
  const content = readFileSync(fullPath, 'utf-8')
  const parsed: unknown = JSON.parse(content)

  jsonCache.set(relativePath, parsed)
  return parsed
}
