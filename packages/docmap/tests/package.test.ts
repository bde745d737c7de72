import { describe, it, expect, beforeAll } from 'vitest'
import { readFileSync } from 'node:fs'
import { resolve, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = dirname(fileURLToPath(import.meta.url))

describe('docmap Package Configuration', () => {
  describe('Package Exports', () => {
    it('should export the schema registry and field builders', async () => {
      const module = await import('../src/index.js')

      expect(typeof module.SchemaRegistry).toBe('function')
      expect(typeof module.field.string).toBe('function')
    })

    it('should export the compiler and reconciler entry points', async () => {
      const module = await import('../src/index.js')

      expect(typeof module.compileSchemaIndexes).toBe('function')
      expect(typeof module.reconcileIndexes).toBe('function')
      expect(typeof module.collectGeoIndexes).toBe('function')
      expect(typeof module.Connection).toBe('function')
    })

    it('should export the error classes', async () => {
      const module = await import('../src/index.js')

      expect(new module.NotUniqueError('dup')).toBeInstanceOf(module.OperationError)
      expect(new module.FieldPathResolutionError('A', 'x', 'y')).toBeInstanceOf(module.SchemaConfigurationError)
    })

    it('should export the direction constants', async () => {
      const module = await import('../src/index.js')

      expect([module.ASCENDING, module.DESCENDING, module.GEO2D]).toEqual([1, -1, '2d'])
    })
  })

  describe('Package.json Configuration', () => {
    let packageJson: Record<string, unknown>

    beforeAll(() => {
      const packagePath = resolve(__dirname, '../package.json')
      const content = readFileSync(packagePath, 'utf-8')
      packageJson = JSON.parse(content)
    })

    it('should have correct package name', () => {
      expect(packageJson.name).toBe('docmap')
    })

    it('should be an ES module', () => {
      expect(packageJson.type).toBe('module')
    })

    it('should point its entry at the TypeScript sources', () => {
      expect(packageJson.types).toBe('./src/index.ts')
      expect(packageJson.exports).toEqual({ '.': './src/index.ts' })
    })

    it('should depend on zod', () => {
      expect(packageJson.dependencies).toHaveProperty('zod')
    })
  })
})
