import { Box, Text } from 'ink'
import type { HistoryEntry } from '../../../shared/types.js'
import { decompressBody, formatBytes } from '../../../cli/utils.js'
import { findHeader, formatDuration } from '../../lib/format.js'

const PREVIEW_LINES = 20

interface DetailPaneProps {
  entry: HistoryEntry
}

export function bodyPreview(entry: HistoryEntry, maxLines = PREVIEW_LINES): string[] {
  const text = decompressBody(entry.responseBody, findHeader(entry.responseHeaders, 'content-encoding'))
  const lines = text.split('\n')
  if (lines.length <= maxLines) return lines
  return [...lines.slice(0, maxLines), `… ${lines.length - maxLines} more line(s)`]
}

export function DetailPane({ entry }: DetailPaneProps) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1} marginTop={1}>
      <Text bold>
        {entry.method} {entry.url}
      </Text>
      {entry.errorClass ? (
        <Text color="red">
          {entry.errorClass}: {entry.errorMessage ?? 'failed'} after {formatDuration(entry.durationMs)}
        </Text>
      ) : (
        <Text>
          Status {entry.status} in {formatDuration(entry.durationMs)}
        </Text>
      )}
      {entry.responseHeaders.map(([name, value], index) => (
        <Text key={`${name}-${index}`} dimColor wrap="truncate-end">
          {name}: {value}
        </Text>
      ))}
      <Box flexDirection="column" marginTop={1}>
        {entry.responseBody.length === 0 ? (
          <Text dimColor>(empty body)</Text>
        ) : (
          bodyPreview(entry).map((line, index) => (
            <Text key={index} wrap="truncate-end">{line}</Text>
          ))
        )}
        {entry.truncated && (
          <Text color="yellow">Body truncated at {formatBytes(entry.responseBody.length)}</Text>
        )}
      </Box>
    </Box>
  )
}
