import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { LogLevel } from '@kitten/config'
import { createLogger, getLogLevel, setLogLevel, setLogSink } from '../log'
import type { LogSink } from '../log'

describe('createLogger', () => {
  let lines: string[] = []
  let previousSink: LogSink
  let previousLevel: LogLevel

  beforeEach(() => {
    lines = []
    previousLevel = getLogLevel()
    previousSink = setLogSink((line) => {
      lines.push(line)
    })
  })

  afterEach(() => {
    setLogSink(previousSink)
    setLogLevel(previousLevel)
  })

  it('writes one JSON line per event', () => {
    setLogLevel('info')
    createLogger('test').info('hello', { n: 1 })

    expect(lines).toHaveLength(1)
    expect(lines[0].endsWith('\n')).toBe(true)
    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({ level: 'info', scope: 'test', msg: 'hello', n: 1 })
    expect(entry).toHaveProperty('ts')
  })

  it('drops events below the threshold', () => {
    setLogLevel('warn')
    const log = createLogger('test')
    log.debug('hidden')
    log.info('hidden')
    log.warn('shown')
    log.error('shown')

    expect(lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error'])
  })

  it('keeps the header when fields reuse its keys', () => {
    setLogLevel('warn')
    createLogger('test').warn('real', { level: 'debug', msg: 'fake', scope: 'other', extra: 1 })

    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({ level: 'warn', scope: 'test', msg: 'real', extra: 1 })
  })

  it('is silent at silent', () => {
    setLogLevel('silent')
    createLogger('test').error('nothing')
    expect(lines).toEqual([])
  })

  it('setLogSink returns the sink it replaced', () => {
    const captured: string[] = []
    const mine: LogSink = (line) => {
      captured.push(line)
    }
    const replaced = setLogSink(mine)
    expect(setLogSink(replaced)).toBe(mine)
  })
})
