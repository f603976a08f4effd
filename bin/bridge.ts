#!/usr/bin/env node
import path from 'path'
import { parseArgs } from 'util'
import { COMMANDS, isCommand, processRequestFile, runCommand, writeResponse } from '../lib/bridge'
import { ensureDirectories, loadConfig } from '../lib/config'
import { AnalysisEngine } from '../lib/engine'
import { errorMessage } from '../lib/errors'

const USAGE = [
  'Usage:',
  '  tabular-analyst <request.json> <response.json>',
  `  tabular-analyst <${COMMANDS.join('|')}> [--file path] [--message text] [--api-key key] [--session id] [--output name]`,
].join('\n')

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string' },
      message: { type: 'string' },
      'api-key': { type: 'string' },
      session: { type: 'string' },
      output: { type: 'string', default: 'result.json' },
    },
  })

  const config = loadConfig()
  await ensureDirectories(config)
  const engine = new AnalysisEngine({ config })

  const [first] = positionals
  const command = first !== undefined && isCommand(first) ? first : null

  // Bridge mode: one request file in, one response file out
  if (!command && positionals.length === 2) {
    const [requestPath, responsePath] = positionals
    console.warn(`[BRIDGE] Processing ${requestPath}`)
    const response = await processRequestFile(engine, requestPath, responsePath)
    console.warn(`[BRIDGE] ${response.status}: wrote ${responsePath}`)
    return 0
  }

  if (!command) {
    console.error(USAGE)
    return 1
  }

  const response = await runCommand(engine, command, {
    file: values.file,
    message: values.message,
    apiKey: values['api-key'],
    sessionId: values.session,
  })

  const outputPath = path.join(config.outputDir, values.output ?? 'result.json')
  await writeResponse(outputPath, response)
  console.log(JSON.stringify(response, null, 2))
  return 0
}

main(process.argv.slice(2))
  .then(code => { process.exitCode = code })
  .catch((err: unknown) => {
    console.error(`[BRIDGE] Fatal: ${errorMessage(err)}`)
    process.exitCode = 1
  })
