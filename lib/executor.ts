import { spawn } from 'child_process'

export interface ExecutionResult {
  stdout: string
  stderr: string
  exitCode: number
}

export interface ExecuteOptions {
  cwd: string
  timeout?: number
  pythonPath?: string
  // written to the interpreter's stdin
  input?: string
}

export async function executePython(code: string, options: ExecuteOptions): Promise<ExecutionResult> {
  const pythonPath = options.pythonPath || process.env.PYTHON_PATH || 'python3'

  return new Promise((resolve) => {
    const proc = spawn(pythonPath, ['-c', code], {
      cwd: options.cwd,
      timeout: options.timeout ?? 30000,
      env: {
        ...process.env,
        PYTHONIOENCODING: 'utf-8',
        MPLBACKEND: 'Agg',
      },
    })

    let stdout = ''
    let stderr = ''

    proc.stdout.on('data', (data: Buffer) => { stdout += data.toString() })
    proc.stderr.on('data', (data: Buffer) => { stderr += data.toString() })

    proc.stdin.on('error', (err) => { stderr += err.message })
    proc.stdin.end(options.input ?? '')

    proc.on('close', (exitCode) => {
      resolve({
        stdout: stdout.slice(0, 1024 * 100),
        stderr: stderr.slice(0, 1024 * 10),
        exitCode: exitCode ?? 1,
      })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, exitCode: 1 })
    })
  })
}
