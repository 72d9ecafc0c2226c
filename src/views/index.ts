import { ValidationError } from '../../cli/errors.js'
import { InteractiveView } from './interactive-view.js'
import { LogView } from './log-view.js'
import { OUTPUT_MODES, type OutputMode, type StatusView, type ViewContext } from './types.js'

export { InteractiveView } from './interactive-view.js'
export { LogView } from './log-view.js'
export type { OutputMode, StatusView, ViewContext } from './types.js'

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some(mode => mode === value)
}

/**
 * Requested mode, or interactive on a terminal and compact elsewhere.
 * Interactive output on a non-TTY degrades to compact.
 */
export function resolveOutputMode(requested: string | undefined, isTTY = process.stdout.isTTY === true): OutputMode {
  if (requested !== undefined && !isOutputMode(requested)) {
    throw new ValidationError(`Invalid output mode "${requested}"`, `Use one of: ${OUTPUT_MODES.join(', ')}`)
  }
  const mode = requested ?? (isTTY ? 'interactive' : 'compact')
  if (mode === 'interactive' && !isTTY) return 'compact'
  return mode
}

export function createView(mode: OutputMode, context: ViewContext): StatusView {
  if (mode === 'interactive') {
    return new InteractiveView(context)
  }
  return new LogView(context.bus, { mode, dashboardBase: context.dashboardBase, routes: context.routes, write: context.write })
}
