import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, symlink } from 'fs/promises'
import { join, relative } from 'pathe'
import { createFileNameMatcher, walkVersionFiles, type WalkOptions } from '../../core/file-walker.js'
import { TestHelpers } from '../utils/test-helpers.js'

async function collect(root: string, options?: WalkOptions): Promise<string[]> {
  const files: string[] = []
  for await (const filePath of walkVersionFiles(root, options)) {
    files.push(relative(root, filePath))
  }
  return files
}

describe('file walker', () => {
  let testHelpers: TestHelpers
  let testDir: string

  beforeEach(async () => {
    testHelpers = new TestHelpers()
    testDir = await testHelpers.createTempDir()
  })

  afterEach(async () => {
    await testHelpers.cleanup()
  })

  describe('createFileNameMatcher', () => {
    it('should match the canonical names case-insensitively', () => {
      const matches = createFileNameMatcher()

      expect(matches('AssemblyInfo.cs')).toBe(true)
      expect(matches('assemblyinfo.CS')).toBe(true)
      expect(matches('CommonAssemblyInfo.cs')).toBe(true)
      expect(matches('SharedAssemblyInfo.cs')).toBe(false)
      expect(matches('AssemblyInfo.cs.bak')).toBe(false)
    })

    it('should match by file ending', () => {
      const matches = createFileNameMatcher({ fileEnding: 'AssemblyInfo.cs' })

      expect(matches('SharedAssemblyInfo.cs')).toBe(true)
      expect(matches('AssemblyInfo.vb')).toBe(false)
    })

    it('should accept glob patterns in place of the defaults', () => {
      const matches = createFileNameMatcher({ files: ['*AssemblyInfo.vb'] })

      expect(matches('AssemblyInfo.vb')).toBe(true)
      expect(matches('GlobalAssemblyInfo.VB')).toBe(true)
      expect(matches('AssemblyInfo.cs')).toBe(false)
    })
  })

  describe('walkVersionFiles', () => {
    beforeEach(async () => {
      await testHelpers.createSourceTree(testDir, {
        'A/Properties/AssemblyInfo.cs': '',
        'B/assemblyinfo.CS': '',
        'B/bin/Release/AssemblyInfo.cs': '',
        'C/Program.cs': '',
        'C/My Project/AssemblyInfo.vb': '',
        'CommonAssemblyInfo.cs': '',
        'node_modules/pkg/AssemblyInfo.cs': '',
      })
    })

    it('should yield recognized files in name order from every directory', async () => {
      expect(await collect(testDir)).toEqual([
        'A/Properties/AssemblyInfo.cs',
        'B/assemblyinfo.CS',
        'B/bin/Release/AssemblyInfo.cs',
        'CommonAssemblyInfo.cs',
        'node_modules/pkg/AssemblyInfo.cs',
      ])
    })

    it('should descend into directories named like build output', async () => {
      await testHelpers.createSourceTree(testDir, {
        'Bin/Properties/AssemblyInfo.cs': '',
        'Obj/AssemblyInfo.cs': '',
      })

      const files = await collect(testDir)

      expect(files).toContain('Bin/Properties/AssemblyInfo.cs')
      expect(files).toContain('Obj/AssemblyInfo.cs')
    })

    it('should add files matching the file ending', async () => {
      expect(await collect(testDir, { fileEnding: 'assemblyinfo.vb' })).toEqual([
        'A/Properties/AssemblyInfo.cs',
        'B/assemblyinfo.CS',
        'C/My Project/AssemblyInfo.vb',
        'CommonAssemblyInfo.cs',
      ])
    })

    it('should skip excluded directory names case-insensitively', async () => {
      expect(await collect(testDir, { exclude: ['BIN', 'node_modules'] })).toEqual([
        'A/Properties/AssemblyInfo.cs',
        'B/assemblyinfo.CS',
        'CommonAssemblyInfo.cs',
      ])
    })

    it('should visit each directory once when links form a cycle', async () => {
      await symlink(testDir, join(testDir, 'A', 'loop'), 'dir')

      expect(await collect(testDir)).toEqual([
        'A/Properties/AssemblyInfo.cs',
        'B/assemblyinfo.CS',
        'B/bin/Release/AssemblyInfo.cs',
        'CommonAssemblyInfo.cs',
        'node_modules/pkg/AssemblyInfo.cs',
      ])
    })

    it('should follow links to directories outside the tree', async () => {
      const outside = await testHelpers.createTempDir()
      await testHelpers.createSourceTree(outside, { 'Shared/CommonAssemblyInfo.cs': '' })
      await symlink(join(outside, 'Shared'), join(testDir, 'C', 'Shared'), 'dir')

      expect(await collect(testDir)).toContain('C/Shared/CommonAssemblyInfo.cs')
    })

    it('should fail with PATH_NOT_FOUND for a missing root', async () => {
      await expect(collect(join(testDir, 'missing'))).rejects.toMatchObject({ code: 'PATH_NOT_FOUND' })
    })

    it('should fail with NOT_A_DIRECTORY for a file root', async () => {
      await expect(collect(join(testDir, 'CommonAssemblyInfo.cs'))).rejects.toMatchObject({ code: 'NOT_A_DIRECTORY' })
    })

    it('should not enter another directory once aborted', async () => {
      const controller = new AbortController()
      const files: string[] = []

      for await (const filePath of walkVersionFiles(testDir, { signal: controller.signal })) {
        files.push(relative(testDir, filePath))
        controller.abort()
      }

      expect(files).toEqual(['A/Properties/AssemblyInfo.cs'])
    })

    it('should yield nothing when aborted before starting', async () => {
      const controller = new AbortController()
      controller.abort()

      expect(await collect(testDir, { signal: controller.signal })).toEqual([])
    })

    it('should yield nothing for an empty directory', async () => {
      const empty = join(testDir, 'empty')
      await mkdir(empty)

      expect(await collect(empty)).toEqual([])
    })
  })
})
