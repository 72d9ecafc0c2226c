import { describe, it, expect, vi } from 'vitest'
import type { AttemptResult } from '../../shared/types.js'
import type { AttemptResultInput } from '../api/types.js'
import { OverloadedError } from '../errors.js'
import { toResultInput } from '../transport/protocol.js'
import { settlesWithin } from '../utils.js'
import { TransportReporter, type ResultChannel } from './reporter.js'

function result(attemptId = 'att_1'): AttemptResult {
  return {
    attemptId,
    connectionId: 'web_1',
    status: 200,
    headers: [],
    body: Buffer.from('ok'),
    truncated: false,
    durationMs: 5,
    finishedAt: '2026-01-01T00:00:00.000Z',
  }
}

function channel(isOpen: boolean, send: ResultChannel['send'] = vi.fn(() => Promise.resolve())) {
  return { isOpen, sessionId: 'ses_1', send: vi.fn(send) }
}

describe('TransportReporter', () => {
  it('should write through the socket while it is open', async () => {
    const open = channel(true)
    const client = { submitAttemptResult: vi.fn(() => Promise.resolve()) }
    const reporter = new TransportReporter({ channel: open, client })

    await reporter.report(result())

    expect(open.send).toHaveBeenCalledTimes(1)
    expect(client.submitAttemptResult).not.toHaveBeenCalled()
    expect(reporter.unreported).toEqual([])
  })

  it('should submit through the control plane while the socket is down', async () => {
    const closed = channel(false)
    const client = { submitAttemptResult: vi.fn(() => Promise.resolve()) }
    const reporter = new TransportReporter({ channel: closed, client })

    await reporter.report(result())

    expect(client.submitAttemptResult).toHaveBeenCalledWith('ses_1', 'att_1', toResultInput(result()))
    expect(closed.send).not.toHaveBeenCalled()
  })

  it('should fall back to the API when the outbound queue is overloaded', async () => {
    const open = channel(true, () => Promise.reject(new OverloadedError()))
    const client = { submitAttemptResult: vi.fn(() => Promise.resolve()) }
    const reporter = new TransportReporter({ channel: open, client })

    await reporter.report(result())

    expect(client.submitAttemptResult).toHaveBeenCalledTimes(1)
    expect(reporter.unreported).toEqual([])
  })

  it('should queue for the next connection when the API submission fails', async () => {
    const closed = channel(false)
    const client = { submitAttemptResult: vi.fn(() => Promise.reject(new Error('503'))) }
    const reporter = new TransportReporter({ channel: closed, client, queueTimeoutMs: 250 })

    await reporter.report(result())

    expect(closed.send).toHaveBeenCalledWith(result(), 250)
    expect(reporter.unreported).toEqual([])
  })

  it('should remember results that could not go anywhere', async () => {
    const closed = channel(false, () => Promise.reject(new OverloadedError()))
    const reporter = new TransportReporter({ channel: closed })

    await reporter.report(result('att_9'))

    expect(reporter.unreported).toEqual(['att_9'])
  })

  it('should let settle wait for reports in progress', async () => {
    let release = () => {}
    const open = channel(true, () => new Promise<void>(resolve => { release = () => resolve() }))
    const reporter = new TransportReporter({ channel: open })

    let settled = false
    const report = reporter.report(result())
    const settling = reporter.settle().then(() => { settled = true })

    await new Promise(resolve => setTimeout(resolve, 10))
    expect(settled).toBe(false)

    release()
    await report
    await settling
    expect(settled).toBe(true)
  })

  it('should count reports still in flight as unreported when abandoned', async () => {
    const closed = channel(false)
    let cancelled = false
    const client = {
      submitAttemptResult: vi.fn((_sessionId: string, _attemptId: string, _input: AttemptResultInput, signal?: AbortSignal) =>
        new Promise<void>((_resolve, reject) => {
          signal?.addEventListener('abort', () => {
            cancelled = true
            reject(new Error('aborted'))
          })
        })),
    }
    const reporter = new TransportReporter({ channel: closed, client })

    const report = reporter.report(result('att_lost'))
    expect(await settlesWithin(reporter.settle(), 50)).toBe(false)
    expect(reporter.pendingIds).toEqual(['att_lost'])

    expect(reporter.abandon()).toEqual(['att_lost'])
    await report

    expect(cancelled).toBe(true)
    expect(closed.send).not.toHaveBeenCalled()
    expect(reporter.pendingIds).toEqual([])
    expect(reporter.unreported).toEqual(['att_lost'])
  })

  it('should return failed reports from abandon when nothing is in flight', async () => {
    const closed = channel(false, () => Promise.reject(new OverloadedError()))
    const reporter = new TransportReporter({ channel: closed })

    await reporter.report(result('att_9'))

    expect(reporter.abandon()).toEqual(['att_9'])
  })
})
