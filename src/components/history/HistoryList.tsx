import { Box, Text } from 'ink'
import type { HistoryEntry } from '../../../shared/types.js'
import { formatDuration, formatTime } from '../../lib/format.js'
import { MethodBadge, StatusBadge } from '../StatusBadge.js'

interface HistoryListProps {
  entries: HistoryEntry[]
  selectedIndex: number
  /** Rows available for entries */
  height: number
  connected: boolean
}

/** Window of `height` rows that keeps the selection visible, pinned to the newest entries otherwise. */
export function visibleRange(total: number, selectedIndex: number, height: number): [number, number] {
  if (total <= height) return [0, total]
  let end = total
  if (selectedIndex >= 0 && selectedIndex < total - height) {
    end = selectedIndex + height
  }
  return [end - height, end]
}

export function HistoryList({ entries, selectedIndex, height, connected }: HistoryListProps) {
  if (entries.length === 0) {
    return (
      <Box marginTop={1}>
        <Text dimColor>{connected ? '● Connected. Waiting for events...' : '○ Connecting...'}</Text>
      </Box>
    )
  }

  const [start, end] = visibleRange(entries.length, selectedIndex, height)

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text dimColor>Events • [↑↓] Navigate</Text>
      {entries.slice(start, end).map((entry, offset) => {
        const index = start + offset
        const isSelected = index === selectedIndex
        return (
          <Text key={`${entry.attemptId}-${index}`} inverse={isSelected} wrap="truncate-end">
            {isSelected ? '> ' : '  '}
            <Text dimColor>{formatTime(entry.timestamp)} </Text>
            <StatusBadge status={entry.status} bucket={entry.bucket} />{' '}
            <MethodBadge method={entry.method} /> {entry.url}
            <Text dimColor> ({formatDuration(entry.durationMs)})</Text>
            {entry.errorClass && <Text color="red"> {entry.errorClass}</Text>}
            {entry.unreported && <Text color="yellow"> unreported</Text>}
          </Text>
        )
      })}
    </Box>
  )
}
