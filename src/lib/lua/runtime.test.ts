import { describe, it, expect, afterEach } from 'vitest'
import { LuaError, LuaRuntime } from './runtime'

describe('LuaRuntime', () => {
  let runtime: LuaRuntime

  afterEach(() => {
    runtime.close()
  })

  it('should return the first result of a chunk', () => {
    runtime = new LuaRuntime()

    expect(runtime.execute('return 1 + 2')).toEqual({ type: 'integer', value: 3 })
    expect(runtime.execute('return 1 / 2')).toEqual({ type: 'number', value: 0.5 })
    expect(runtime.execute('return "a" .. "b", 2')).toEqual({ type: 'string', value: 'ab' })
    expect(runtime.execute('return {}')).toEqual({ type: 'table' })
    expect(runtime.execute('local x = 1')).toEqual({ type: 'nil' })
  })

  it('should read and write globals', () => {
    runtime = new LuaRuntime()
    runtime.setGlobal('answer', { type: 'integer', value: 42 })
    runtime.execute('doubled = answer * 2')

    expect(runtime.getGlobal('doubled')).toEqual({ type: 'integer', value: 84 })
    expect(runtime.getGlobal('missing')).toEqual({ type: 'nil' })
  })

  it('should call registered host functions', () => {
    runtime = new LuaRuntime()
    const seen: string[] = []
    runtime.registerFunction('record', (...args) => {
      seen.push(args.map(a => a.text).join(','))
      return { type: 'boolean', value: true }
    })

    expect(runtime.execute('return record("x", 1.5, nil)')).toEqual({ type: 'boolean', value: true })
    expect(seen).toEqual(['x,1.5,nil'])
  })

  it('should decode invalid UTF-8 with replacement characters', () => {
    runtime = new LuaRuntime()
    const seen: string[] = []
    runtime.registerFunction('record', (...args) => {
      seen.push(args.map(a => a.text).join(','))
      return undefined
    })

    expect(runtime.execute('return "a\\255b"')).toEqual({ type: 'string', value: 'a\uFFFDb' })
    runtime.execute('record("x\\255")')
    expect(seen).toEqual(['x\uFFFD'])
  })

  it('should raise host exceptions inside Lua', () => {
    runtime = new LuaRuntime()
    runtime.registerFunction('fail', () => {
      throw new Error('host failure')
    })

    expect(runtime.execute('local ok, err = pcall(fail) return err')).toEqual({
      type: 'string',
      value: 'host failure',
    })
  })

  it('should throw LuaError with the chunk position', () => {
    runtime = new LuaRuntime({ chunkName: 'snippet' })

    expect(() => runtime.execute('\nerror("bad")')).toThrow(new LuaError('snippet:2: bad'))
  })

  it('should throw LuaError on syntax errors', () => {
    runtime = new LuaRuntime()

    expect(() => runtime.execute('this is not lua')).toThrow(LuaError)
  })

  it('should remove unsafe globals in sandbox mode', () => {
    runtime = new LuaRuntime()

    expect(runtime.execute('return type(os) .. type(io) .. type(require) .. type(load)')).toEqual({
      type: 'string',
      value: 'nilnilnilnil',
    })
    expect(runtime.execute('return type(string.format)')).toEqual({ type: 'string', value: 'function' })
  })

  it('should keep the standard library without sandbox', () => {
    runtime = new LuaRuntime({ sandbox: false })

    expect(runtime.execute('return type(os)')).toEqual({ type: 'string', value: 'table' })
  })

  it('should refuse to run after close', () => {
    runtime = new LuaRuntime()
    runtime.close()

    expect(runtime.closed).toBe(true)
    expect(() => runtime.execute('return 1')).toThrow('Lua runtime is closed')
  })
})
