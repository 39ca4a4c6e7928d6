import { describe, it, expect } from 'vitest'
import { ScreenLog } from './ScreenLog'

describe('ScreenLog', () => {
  it('should join visible lines oldest first', () => {
    const log = new ScreenLog()
    log.push('one')
    log.push('two')

    expect(log.text()).toBe('one\ntwo')
  })

  it('should drop the oldest lines beyond the cap', () => {
    const log = new ScreenLog({ maxLines: 2 })
    log.push('one')
    log.push('two')
    log.push('three')

    expect(log.text()).toBe('two\nthree')
    expect(log.size).toBe(2)
  })

  it('should expire lines after their time to live', () => {
    const log = new ScreenLog()
    log.push('old')
    log.update(1.5)
    log.push('new')

    log.update(0.5)
    expect(log.text()).toBe('new')

    log.update(1.5)
    expect(log.text()).toBe('')
  })

  it('should keep at most six lines by default', () => {
    const log = new ScreenLog()
    for (let i = 1; i <= 8; i++) log.push(`line ${i}`)

    expect(log.text().split('\n')).toEqual(['line 3', 'line 4', 'line 5', 'line 6', 'line 7', 'line 8'])
  })
})
