import { Box, Text } from 'ink'
import type { HistoryEntry } from '../../../shared/types.js'

interface StatusLineProps {
  selected?: HistoryEntry
  userNavigated: boolean
  message?: string
}

export function describeSelection(entry: HistoryEntry, userNavigated: boolean): string {
  const which = userNavigated ? 'Selected event' : 'Last event'
  if (entry.errorClass) {
    return `✗ ${which} failed with error`
  }
  if (entry.bucket === '2xx' || entry.bucket === '3xx') {
    return `✓ ${which} succeeded with status ${entry.status}`
  }
  return `✗ ${which} failed with status ${entry.status}`
}

export function StatusLine({ selected, userNavigated, message }: StatusLineProps) {
  return (
    <Box flexDirection="column" marginTop={1}>
      {selected && (
        <Text>
          {'> '}
          <Text color={selected.bucket === '2xx' || selected.bucket === '3xx' ? 'green' : 'red'}>
            {describeSelection(selected, userNavigated)}
          </Text>
          <Text dimColor> | [r] Retry • [o] Open in dashboard • [d] Show data • [q] Quit</Text>
        </Text>
      )}
      {message && <Text color="cyan">{message}</Text>}
    </Box>
  )
}
