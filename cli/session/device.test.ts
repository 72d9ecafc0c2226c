import { describe, it, expect } from 'vitest'
import { deviceName } from './device.js'

describe('deviceName', () => {
  it('should combine host and user into a slug', () => {
    expect(deviceName('Host.Local', 'alice')).toBe('host-local-alice')
  })

  it('should fall back when nothing usable is left', () => {
    expect(deviceName('', '')).toBe('unknown-device')
  })
})
