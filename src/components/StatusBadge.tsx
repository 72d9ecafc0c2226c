import { Text } from 'ink'
import type { StatusBucket } from '../../shared/types.js'

export function bucketColor(bucket: StatusBucket): string {
  switch (bucket) {
    case '2xx': return 'green'
    case '3xx': return 'cyan'
    case '4xx': return 'yellow'
    case '5xx':
    case 'err': return 'red'
  }
}

interface StatusBadgeProps {
  status?: number
  bucket: StatusBucket
}

export function StatusBadge({ status, bucket }: StatusBadgeProps) {
  return (
    <Text color={bucketColor(bucket)}>
      [{status === undefined ? 'ERR' : status}]
    </Text>
  )
}

function getMethodColor(method: string) {
  switch (method) {
    case 'GET': return 'blue'
    case 'POST': return 'green'
    case 'PUT': return 'yellow'
    case 'PATCH': return 'yellow'
    case 'DELETE': return 'red'
    default: return 'gray'
  }
}

interface MethodBadgeProps {
  method: string
}

export function MethodBadge({ method }: MethodBadgeProps) {
  return (
    <Text color={getMethodColor(method)} bold>
      {method}
    </Text>
  )
}
