import { describe, it, expect } from 'vitest'
import fs from 'fs/promises'
import path from 'path'
import { DEFAULT_MODEL, DEFAULT_RENDER_TIMEOUT, ensureDirectories, loadConfig } from '@/lib/config'
import { makeTempDir } from '../fakes'

describe('loadConfig', () => {
  it('should default to a shared-data directory under the working directory', () => {
    const config = loadConfig({}, '/srv/app')
    expect(config).toEqual({
      apiKey: undefined,
      model: DEFAULT_MODEL,
      inputDir: path.join('/srv/app', 'shared-data', 'input'),
      outputDir: path.join('/srv/app', 'shared-data', 'output'),
      tempDir: path.join('/srv/app', 'shared-data', 'temp'),
      pythonPath: 'python3',
      renderTimeout: DEFAULT_RENDER_TIMEOUT,
    })
  })

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-secret',
      ANALYST_MODEL: 'test-model',
      SHARED_DATA_DIR: '/data/shared',
      PYTHON_PATH: '/opt/py',
      ANALYST_RENDER_TIMEOUT_MS: '5000',
    }, '/srv/app')

    expect(config).toMatchObject({
      apiKey: 'test-secret',
      model: 'test-model',
      outputDir: path.join('/data/shared', 'output'),
      pythonPath: '/opt/py',
      renderTimeout: 5000,
    })
  })

  it('should ignore a render timeout that is not a positive number', () => {
    expect(loadConfig({ ANALYST_RENDER_TIMEOUT_MS: 'soon' }).renderTimeout).toBe(DEFAULT_RENDER_TIMEOUT)
    expect(loadConfig({ ANALYST_RENDER_TIMEOUT_MS: '-1' }).renderTimeout).toBe(DEFAULT_RENDER_TIMEOUT)
  })
})

describe('ensureDirectories', () => {
  it('should create the three shared directories and tolerate reruns', async () => {
    const root = await makeTempDir()
    const config = loadConfig({ SHARED_DATA_DIR: root }, root)

    await ensureDirectories(config)
    await ensureDirectories(config)

    expect((await fs.readdir(root)).sort()).toEqual(['input', 'output', 'temp'])
    await fs.rm(root, { recursive: true, force: true })
  })
})
