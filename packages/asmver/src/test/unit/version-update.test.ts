import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFile } from 'fs/promises'
import { join } from 'pathe'
import { VersionUpdateService } from '../../core/version-update.js'
import { createVersionPattern } from '../../core/version-pattern.js'
import { TestHelpers } from '../utils/test-helpers.js'

describe('VersionUpdateService', () => {
  let service: VersionUpdateService
  let testHelpers: TestHelpers
  let testDir: string

  beforeEach(async () => {
    service = new VersionUpdateService()
    testHelpers = new TestHelpers()
    testDir = await testHelpers.createTempDir()
  })

  afterEach(async () => {
    await testHelpers.cleanup()
  })

  it('should only touch the one recognized file in the tree', async () => {
    await testHelpers.createSourceTree(testDir, {
      'Core/Properties/AssemblyInfo.cs': testHelpers.assemblyInfo('1.2.0.0'),
      'Web/Program.cs': 'class Program { }\n',
      'Tests/README.md': '# Tests\n',
    })

    const summary = await service.run({ root: testDir, values: { build: 7434 }, pattern: createVersionPattern() })

    expect(summary.filesScanned).toBe(1)
    expect(summary.filesMatched).toBe(1)
    expect(summary.filesModified).toBe(1)
    expect(summary.errors).toEqual([])
    expect(summary.results).toEqual([{
      filePath: 'Core/Properties/AssemblyInfo.cs',
      matched: 2,
      modified: true,
      changes: [
        { attribute: 'AssemblyVersion', component: 'build', oldValue: '0', newValue: '7434', lineNumber: 6 },
        { attribute: 'AssemblyFileVersion', component: 'build', oldValue: '0', newValue: '7434', lineNumber: 7 },
      ],
    }])

    expect(await readFile(join(testDir, 'Core/Properties/AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('1.2.7434.0'))
    expect(await readFile(join(testDir, 'Web/Program.cs'), 'utf-8')).toBe('class Program { }\n')
  })

  it('should only update the selected attribute', async () => {
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': testHelpers.assemblyInfo('1.0.0.0') })

    await service.run({ root: testDir, values: { build: 12 }, pattern: createVersionPattern({ attributes: 'f' }) })

    expect(await readFile(join(testDir, 'AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('1.0.0.0', '1.0.12.0'))
  })

  it('should leave files without declarations byte-identical', async () => {
    const original = Buffer.from('\uFEFFusing System;\r\n// no version here\r\n', 'utf8')
    await testHelpers.createSourceTree(testDir, { 'CommonAssemblyInfo.cs': original })

    const summary = await service.run({ root: testDir, values: { build: 3 }, pattern: createVersionPattern() })

    expect(summary.filesScanned).toBe(1)
    expect(summary.filesMatched).toBe(0)
    expect(summary.filesModified).toBe(0)
    expect(await readFile(join(testDir, 'CommonAssemblyInfo.cs'))).toEqual(original)
  })

  it('should report changes without writing in dry-run mode', async () => {
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': testHelpers.assemblyInfo('2.0.1.0') })

    const summary = await service.run({ root: testDir, values: { build: 5 }, pattern: createVersionPattern(), dryRun: true })

    expect(summary.dryRun).toBe(true)
    expect(summary.filesModified).toBe(1)
    expect(summary.results[0].changes).toHaveLength(2)
    expect(await readFile(join(testDir, 'AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('2.0.1.0'))
  })

  it('should be idempotent across runs', async () => {
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': testHelpers.assemblyInfo('1.2.0.*') })
    const options = { root: testDir, values: { build: 500 }, pattern: createVersionPattern() }

    const first = await service.run(options)
    const second = await service.run(options)

    expect(first.filesModified).toBe(1)
    expect(second.filesModified).toBe(0)
    expect(second.filesMatched).toBe(1)
    expect(await readFile(join(testDir, 'AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('1.2.500.*'))
  })

  it('should keep a file byte-identical when given its own build number', async () => {
    const original = Buffer.from(testHelpers.assemblyInfo('1.0.0042.0', '1.0.0042.0', '\r\n'))
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': original })

    const summary = await service.run({ root: testDir, values: { build: 42 }, pattern: createVersionPattern() })

    expect(summary.filesModified).toBe(0)
    expect(await readFile(join(testDir, 'AssemblyInfo.cs'))).toEqual(original)
  })

  it('should set the other components when requested', async () => {
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': testHelpers.assemblyInfo('1.2.0.0') })

    await service.run({ root: testDir, values: { major: 2, minor: 0, build: 8, revision: 1 }, pattern: createVersionPattern() })

    expect(await readFile(join(testDir, 'AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('2.0.8.1'))
  })

  it('should stop before the next file once cancelled', async () => {
    await testHelpers.createSourceTree(testDir, { 'AssemblyInfo.cs': testHelpers.assemblyInfo('1.0.0.0') })
    const controller = new AbortController()
    controller.abort()

    const summary = await service.run({ root: testDir, values: { build: 9 }, pattern: createVersionPattern(), signal: controller.signal })

    expect(summary.cancelled).toBe(true)
    expect(summary.filesScanned).toBe(0)
    expect(await readFile(join(testDir, 'AssemblyInfo.cs'), 'utf-8')).toBe(testHelpers.assemblyInfo('1.0.0.0'))
  })

  it('should reject a missing root before processing anything', async () => {
    await expect(service.run({ root: join(testDir, 'nope'), values: { build: 1 }, pattern: createVersionPattern() }))
      .rejects.toMatchObject({ code: 'PATH_NOT_FOUND' })
  })
})
