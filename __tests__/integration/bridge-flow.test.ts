import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs/promises'
import path from 'path'
import { processRequestFile } from '@/lib/bridge'
import type { AppConfig } from '@/lib/config'
import { AnalysisEngine } from '@/lib/engine'
import type { BridgeResponse } from '@/lib/types'
import { FakeRenderer, KeywordReasoning, SAMPLE_CSV, makeConfig, makeTempDir } from '../fakes'

let dir: string
let config: AppConfig
let engine: AnalysisEngine
let counter = 0

async function send(body: string): Promise<BridgeResponse> {
  counter++
  const requestPath = path.join(config.tempDir, `request_${counter}.json`)
  const responsePath = path.join(config.tempDir, `response_${counter}.json`)
  await fs.writeFile(requestPath, body)

  await processRequestFile(engine, requestPath, responsePath)
  return JSON.parse(await fs.readFile(responsePath, 'utf-8'))
}

beforeEach(async () => {
  dir = await makeTempDir()
  config = await makeConfig(dir)
  await fs.copyFile(SAMPLE_CSV, path.join(config.inputDir, 'sample.csv'))
  engine = new AnalysisEngine({ config, renderer: new FakeRenderer(), reasoning: new KeywordReasoning() })
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('Bridge request flow', () => {
  it('should load a file named relative to the input directory', async () => {
    const response = await send('{"id":"1","type":"load_data","fileData":{"path":"sample.csv","name":"sample.csv"}}')

    expect(response.id).toBe('1')
    expect(response.status).toBe('success')
    expect(response.message).toContain('6')
    expect(response.message).toContain('5')
    expect(engine.summary()?.shape).toEqual({ rows: 6, columns: 5 })
  })

  it('should chart revenue by month once the table is loaded', async () => {
    await send('{"id":"1","type":"load_data","fileData":{"path":"sample.csv","name":"sample.csv"}}')
    const response = await send('{"id":"2","type":"chat","message":"Show revenue by month"}')

    expect(response.id).toBe('2')
    expect(response.status).toBe('success')
    expect(response.charts).toHaveLength(1)
    for (const chart of response.charts ?? []) {
      expect(chart).toMatch(/^bar_chart_\d{8}_\d{6}_\d{3}(_\d+)?\.png$/)
    }
    expect(await fs.readdir(config.outputDir)).toEqual(response.charts)
  })

  it('should explain that no data is loaded when asked for a heatmap first', async () => {
    const response = await send('{"id":"3","type":"chat","message":"show a heatmap"}')

    expect(response).toEqual({
      id: '3',
      status: 'success',
      message: 'No data loaded. Please load a CSV or Excel file first.',
      charts: [],
    })
  })

  it('should answer an unparseable request with the unknown id', async () => {
    const response = await send('this is not json')

    expect(response.id).toBe('unknown')
    expect(response.status).toBe('error')
    expect(response.error).toBe('MalformedRequest')
  })

  it('should leave the loaded table in place after an unsupported file', async () => {
    await fs.writeFile(path.join(config.inputDir, 'notes.txt'), 'plain text')
    await send('{"id":"1","type":"load_data","fileData":{"path":"sample.csv"}}')

    const response = await send('{"id":"4","type":"load_data","fileData":{"path":"notes.txt"}}')

    expect(response).toMatchObject({ id: '4', status: 'error', error: 'UnsupportedFormat' })
    expect(engine.summary()?.fileName).toBe('sample.csv')
  })

  it('should keep 2N turns after N chats and start fresh after clear', async () => {
    await send('{"id":"1","type":"chat","message":"hello"}')
    await send('{"id":"2","type":"chat","message":"again"}')
    expect(engine.history()).toHaveLength(4)

    engine.clear()
    await send('{"id":"3","type":"chat","message":"fresh start"}')

    expect(engine.history()).toEqual([
      { role: 'user', content: 'fresh start' },
      { role: 'assistant', content: 'You said: fresh start' },
    ])
  })

  it('should echo the id of every parseable request', async () => {
    const bodies = [
      '{"id":"a","type":"chat","message":"hi"}',
      '{"id":"b","type":"load_data"}',
      '{"id":"c","type":"unsupported"}',
      '{"id":"d","type":"chat"}',
    ]
    for (const body of bodies) {
      const response = await send(body)
      expect(response.id).toBe(JSON.parse(body).id)
    }
  })
})
