import { Box, Text } from 'ink'
import type { TransportStatus } from '../../../shared/types.js'
import { describeTransport } from '../../lib/format.js'

export interface HeaderInfo {
  version: string
  userName?: string
  projectName?: string
}

interface HeaderProps {
  info: HeaderInfo
  transport: TransportStatus
  inFlight: number
  notice?: string
}

function transportColor(transport: TransportStatus): string {
  if (transport.reauthenticating) return 'yellow'
  if (transport.state === 'open') return 'green'
  if (transport.state === 'closed') return 'red'
  return 'yellow'
}

export function Header({ info, transport, inFlight, notice }: HeaderProps) {
  const identity = [info.userName, info.projectName].filter(Boolean).join(' / ')

  return (
    <Box flexDirection="column">
      <Box justifyContent="space-between">
        <Text>
          <Text bold>hookrelay</Text>
          <Text dimColor> v{info.version}</Text>
          {identity && <Text dimColor>  {identity}</Text>}
        </Text>
        <Text>
          {inFlight > 0 && <Text color="cyan">{inFlight} in flight  </Text>}
          <Text color={transportColor(transport)}>● {describeTransport(transport)}</Text>
        </Text>
      </Box>
      {notice && <Text color="yellow">● {notice}</Text>}
    </Box>
  )
}
