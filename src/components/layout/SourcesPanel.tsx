import { Box, Text } from 'ink'
import type { Route } from '../../../shared/types.js'

interface SourcesPanelProps {
  routes: Route[]
}

export function SourcesPanel({ routes }: SourcesPanelProps) {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text dimColor>Listening on {routes.length} connection{routes.length === 1 ? '' : 's'}</Text>
      {routes.map(route => (
        <Box key={route.connectionId} flexDirection="column" marginLeft={1}>
          <Text>
            <Text bold>{route.sourceName}</Text>
            <Text dimColor> ({route.connectionName})</Text>
          </Text>
          {route.sourceUrl && <Text dimColor>  Requests to {route.sourceUrl}</Text>}
          <Text>  Forwarding to <Text color="cyan">{route.localBase.href}</Text></Text>
        </Box>
      ))}
    </Box>
  )
}
