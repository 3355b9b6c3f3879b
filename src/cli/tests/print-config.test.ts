import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { writeFile, mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { runCli } from '../cli'
import { captureOutput } from './capture'

describe('print-config command', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'tripwire-print-config-'))

    await writeFile(join(testDir, 'tripwire.config.json'), JSON.stringify({ level: 'Warning', quitOnAssert: true }))
    await writeFile(join(testDir, 'invalid.json'), JSON.stringify({ level: 'Loud' }))
    await writeFile(join(testDir, 'malformed.json'), '{ invalid json }')
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  it('should print configuration in JSON format', async () => {
    const mockExit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`)
    })

    const capture = captureOutput()

    try {
      await runCli(['print-config', '--quiet', '--config', join(testDir, 'tripwire.config.json')])

      const outputConfig: unknown = JSON.parse(capture.getLogs().trim())

      expect(outputConfig).toEqual({
        level: 'Warning',
        quitOnAssert: true,
        calleeNames: ['assert'],
        levelNames: ['Level'],
        outDir: 'stripped',
      })
      expect(capture.getErrors()).toBe('')
      expect(mockExit).not.toHaveBeenCalled()
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })

  it('should confirm a valid configuration unless quiet', async () => {
    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(testDir, 'tripwire.config.json')])

      expect(capture.getErrors()).toBe('✅ Configuration is valid')
    } finally {
      capture.restore()
    }
  })

  it('should exit with error for an unknown level', async () => {
    const mockExit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })

    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(testDir, 'invalid.json')]).catch(() => undefined)

      expect(capture.getErrors()).toContain('❌ Configuration validation failed:')
      expect(capture.getErrors()).toContain('level: ')
      expect(mockExit).toHaveBeenCalledWith(1)
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })

  it('should exit with error for malformed config file', async () => {
    const mockExit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })

    const capture = captureOutput()

    try {
      await runCli(['print-config', '--config', join(testDir, 'malformed.json')]).catch(() => undefined)

      expect(capture.getErrors()).toContain('❌ Failed to load configuration:')
      expect(mockExit).toHaveBeenCalledWith(1)
    } finally {
      capture.restore()
      mockExit.mockRestore()
    }
  })
})
