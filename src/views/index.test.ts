import { describe, it, expect, vi } from 'vitest'
import { ValidationError } from '../../cli/errors.js'
import { ListenEventBus } from '../../cli/events.js'
import { createView, LogView, resolveOutputMode, InteractiveView, type ViewContext } from './index.js'

describe('resolveOutputMode', () => {
  it('should default to interactive on a terminal', () => {
    expect(resolveOutputMode(undefined, true)).toBe('interactive')
  })

  it('should default to compact elsewhere', () => {
    expect(resolveOutputMode(undefined, false)).toBe('compact')
  })

  it('should degrade interactive to compact without a terminal', () => {
    expect(resolveOutputMode('interactive', false)).toBe('compact')
  })

  it('should keep explicit log modes', () => {
    expect(resolveOutputMode('quiet', true)).toBe('quiet')
    expect(resolveOutputMode('compact', true)).toBe('compact')
  })

  it('should reject unknown modes with the valid choices', () => {
    const err = (() => {
      try {
        resolveOutputMode('fancy', true)
      } catch (e) {
        return e
      }
    })()

    expect(err).toBeInstanceOf(ValidationError)
    expect(err).toMatchObject({
      message: 'Invalid output mode "fancy"',
      hint: 'Use one of: interactive, compact, quiet',
      exitCode: 2,
    })
  })
})

describe('createView', () => {
  const context: ViewContext = {
    bus: new ListenEventBus(),
    routes: [],
    dashboardBase: 'https://dash.example.test',
    info: { version: '0.0.0-test' },
    actions: { retry: vi.fn(), open: vi.fn() },
    onQuit: vi.fn(),
  }

  it('should pick the log view for log modes', () => {
    expect(createView('compact', context)).toBeInstanceOf(LogView)
    expect(createView('quiet', context)).toBeInstanceOf(LogView)
  })

  it('should pick the dashboard for interactive mode', () => {
    expect(createView('interactive', context)).toBeInstanceOf(InteractiveView)
  })
})
