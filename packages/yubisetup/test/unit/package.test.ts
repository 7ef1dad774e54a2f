import { describe, it, expect } from 'vitest'
import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const PACKAGE_DIR = path.resolve(__dirname, '../..')

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readManifest(): Record<string, unknown> {
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(PACKAGE_DIR, 'package.json'), 'utf8'))
  if (!isObject(manifest)) {
    throw new Error('package.json is not an object')
  }
  return manifest
}

describe('package.json', () => {
  const manifest = readManifest()
  const rootExport = isObject(manifest.exports) ? manifest.exports['.'] : undefined

  it('should publish types from the shipped dist directory', () => {
    expect(manifest.files).toEqual(['dist'])
    expect(manifest.types).toBe('./dist/index.d.ts')
    expect(rootExport).toMatchObject({ types: './dist/index.d.ts', default: './dist/index.js' })
  })

  it('should expose the TypeScript sources under the source condition', () => {
    expect(isObject(rootExport) ? Object.keys(rootExport)[0] : undefined).toBe('source')
    expect(rootExport).toMatchObject({ source: './src/index.ts' })
    expect(fs.existsSync(path.join(PACKAGE_DIR, 'src/index.ts'))).toBe(true)
  })
})
