import { describe, it, expect, vi } from 'vitest'
import { RemoteUnavailableError } from '../../cli/errors.js'
import { makeEntry } from '../../cli/test-utils/index.js'
import { createActions } from './actions.js'

describe('createActions', () => {
  function setup() {
    const client = { retryEvent: vi.fn<[string], Promise<void>>().mockResolvedValue(undefined) }
    const open = vi.fn<[string], Promise<void>>().mockResolvedValue(undefined)
    return { client, open, actions: createActions(client, open) }
  }

  describe('retry', () => {
    it('should ask the control plane to retry the event', async () => {
      const { client, actions } = setup()

      expect(await actions.retry(makeEntry())).toBe('Retry requested for event evt_1')
      expect(client.retryEvent).toHaveBeenCalledWith('evt_1')
    })

    it('should explain when there is no event id', async () => {
      const { client, actions } = setup()

      expect(await actions.retry(makeEntry({ eventId: undefined }))).toBe('This attempt has no event id to retry')
      expect(client.retryEvent).not.toHaveBeenCalled()
    })

    it('should report a failed retry', async () => {
      const { client, actions } = setup()
      client.retryEvent.mockRejectedValue(new RemoteUnavailableError('service unavailable'))

      expect(await actions.retry(makeEntry())).toBe('Retry failed: service unavailable')
    })
  })

  describe('open', () => {
    it('should open the dashboard link', async () => {
      const { open, actions } = setup()

      expect(await actions.open(makeEntry())).toBe('Opened https://dash.example.test/events/evt_1')
      expect(open).toHaveBeenCalledWith('https://dash.example.test/events/evt_1')
    })

    it('should explain when there is no link', async () => {
      const { actions } = setup()

      expect(await actions.open(makeEntry({ dashboardUrl: undefined }))).toBe('This attempt has no dashboard link')
    })

    it('should report a browser that cannot be started', async () => {
      const { open, actions } = setup()
      open.mockRejectedValue(new Error('spawn xdg-open ENOENT'))

      expect(await actions.open(makeEntry())).toBe('Could not open a browser: spawn xdg-open ENOENT')
    })
  })
})
