import fs from 'fs/promises'
import path from 'path'

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514'
export const DEFAULT_RENDER_TIMEOUT = 30000
export const MAX_AGENT_ITERATIONS = 5

export interface AppConfig {
  apiKey?: string
  model: string
  inputDir: string
  outputDir: string
  tempDir: string
  pythonPath: string
  renderTimeout: number
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const sharedDir = path.resolve(cwd, env.SHARED_DATA_DIR || 'shared-data')
  const timeout = Number(env.ANALYST_RENDER_TIMEOUT_MS)

  return {
    apiKey: env.ANTHROPIC_API_KEY || undefined,
    model: env.ANALYST_MODEL || DEFAULT_MODEL,
    inputDir: path.join(sharedDir, 'input'),
    outputDir: path.join(sharedDir, 'output'),
    tempDir: path.join(sharedDir, 'temp'),
    pythonPath: env.PYTHON_PATH || 'python3',
    renderTimeout: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_RENDER_TIMEOUT,
  }
}

export async function ensureDirectories(config: AppConfig): Promise<void> {
  for (const dir of [config.inputDir, config.outputDir, config.tempDir]) {
    await fs.mkdir(dir, { recursive: true })
  }
}
