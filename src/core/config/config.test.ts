import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig, configFromEnv, validateConfig, ConfigurationError, ConfigLoadError, ConfigValidationError } from '.'

describe('TripwireConfig validation', () => {
  it('should apply defaults correctly', () => {
    expect(validateConfig({})).toEqual({
      level: 'NoAssertions',
      quitOnAssert: false,
      calleeNames: ['assert'],
      levelNames: ['Level'],
      outDir: 'stripped',
    })
  })

  it('should reject an unknown level', () => {
    expect(() => validateConfig({ level: 'Info' })).toThrow(ConfigValidationError)
  })

  it('should summarise validation errors by path', () => {
    try {
      validateConfig({ calleeNames: ['not an identifier'] })
      throw new Error('expected validation to fail')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError)
      if (error instanceof ConfigValidationError) {
        expect(error.getErrorSummary()).toBe('calleeNames.0: must be a valid identifier')
      }
    }
  })

  it('should treat validation errors as configuration errors', () => {
    expect(() => validateConfig({ quitOnAssert: 'yes' })).toThrow(ConfigurationError)
  })
})

describe('configFromEnv', () => {
  it('should read the level and flag', () => {
    const config = configFromEnv({ TRIPWIRE_LEVEL: 'Warning', TRIPWIRE_QUIT_ON_ASSERT: '1' })

    expect(config.level).toBe('Warning')
    expect(config.quitOnAssert).toBe(true)
  })

  it('should treat an empty level as absent', () => {
    expect(configFromEnv({ TRIPWIRE_LEVEL: '' }).level).toBe('NoAssertions')
  })

  it('should reject an unknown level name', () => {
    expect(() => configFromEnv({ TRIPWIRE_LEVEL: 'bogus' })).toThrow(ConfigurationError)
  })

  it('should reject an unparseable flag', () => {
    expect(() => configFromEnv({ TRIPWIRE_QUIT_ON_ASSERT: 'maybe' })).toThrow(
      'TRIPWIRE_QUIT_ON_ASSERT must be true or false, got "maybe"',
    )
  })

  it('should honour a custom prefix', () => {
    expect(configFromEnv({ APP_ASSERT_LEVEL: 'Error' }, 'APP_ASSERT_').level).toBe('Error')
  })
})

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tripwire-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should use defaults when there is no config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} })

    expect(config.level).toBe('NoAssertions')
    expect(config.outDir).toBe('stripped')
  })

  it('should read tripwire.config.json from the working directory', async () => {
    await writeFile(join(dir, 'tripwire.config.json'), JSON.stringify({ level: 'Warning', calleeNames: ['check'] }))

    const config = await loadConfig({ cwd: dir, env: {} })

    expect(config.level).toBe('Warning')
    expect(config.calleeNames).toEqual(['check'])
  })

  it('should apply env over the file and CLI args over env', async () => {
    await writeFile(join(dir, 'custom.json'), JSON.stringify({ level: 'Warning', outDir: 'from-file' }))

    const config = await loadConfig({
      cwd: dir,
      configPath: 'custom.json',
      env: { TRIPWIRE_LEVEL: 'Error', TRIPWIRE_OUT_DIR: 'from-env' },
      cliArgs: { outDir: 'from-cli', level: undefined },
    })

    expect(config.level).toBe('Error')
    expect(config.outDir).toBe('from-cli')
  })

  it('should wrap unreadable files in ConfigLoadError', async () => {
    await writeFile(join(dir, 'broken.json'), '{ level: ')

    await expect(loadConfig({ cwd: dir, configPath: 'broken.json', env: {} })).rejects.toBeInstanceOf(ConfigLoadError)
  })

  it('should reject a file that is not a JSON object', async () => {
    await writeFile(join(dir, 'list.json'), '[]')

    await expect(loadConfig({ cwd: dir, configPath: 'list.json', env: {} })).rejects.toThrow(
      `Failed to load config file: ${join(dir, 'list.json')} must contain a JSON object`,
    )
  })

  it('should reject a missing explicit config path', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'missing.json', env: {} })).rejects.toBeInstanceOf(ConfigLoadError)
  })
})

describe('validation sources', () => {
  it('should name the source of invalid values', () => {
    expect(() => validateConfig({ outDir: '' }, 'tripwire.config.json')).toThrow(
      'Invalid tripwire configuration (tripwire.config.json)',
    )
  })
})
