import type { HistoryEntry } from '../../shared/types.js'
import type { ControlPlaneClient } from '../../cli/api/client.js'
import { describeError } from '../../cli/errors.js'
import { openInBrowser } from './opener.js'

/** Key actions; each resolves to the feedback shown in the status line. */
export interface ListenActions {
  retry(entry: HistoryEntry): Promise<string>
  open(entry: HistoryEntry): Promise<string>
}

export function createActions(
  client: Pick<ControlPlaneClient, 'retryEvent'>,
  open: (url: string) => Promise<void> = openInBrowser,
): ListenActions {
  return {
    async retry(entry) {
      if (!entry.eventId) {
        return 'This attempt has no event id to retry'
      }
      try {
        await client.retryEvent(entry.eventId)
        return `Retry requested for event ${entry.eventId}`
      } catch (err) {
        return `Retry failed: ${describeError(err)}`
      }
    },

    async open(entry) {
      if (!entry.dashboardUrl) {
        return 'This attempt has no dashboard link'
      }
      try {
        await open(entry.dashboardUrl)
        return `Opened ${entry.dashboardUrl}`
      } catch (err) {
        return `Could not open a browser: ${describeError(err)}`
      }
    },
  }
}
