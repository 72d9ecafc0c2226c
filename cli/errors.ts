/**
 * Errors that end a listen session. Each carries the process exit code the
 * supervisor translates it into, and optionally a suggested next step.
 */
export class ListenError extends Error {
  readonly exitCode: number
  readonly hint?: string

  constructor(message: string, exitCode: number, hint?: string) {
    super(message)
    this.name = new.target.name
    this.exitCode = exitCode
    this.hint = hint
  }
}

export class ValidationError extends ListenError {
  constructor(message: string, hint?: string) {
    super(message, 2, hint)
  }
}

export class UnauthenticatedError extends ListenError {
  constructor(message = 'Not authenticated', hint = 'Run the login command, or set HOOKRELAY_API_KEY') {
    super(message, 3, hint)
  }
}

export class ConflictError extends ListenError {
  constructor(message: string, hint?: string) {
    super(message, 2, hint)
  }
}

export class RemoteUnavailableError extends ListenError {
  constructor(message: string) {
    super(message, 2, 'Check your network connection and try again')
  }
}

export class ApiError extends ListenError {
  readonly status: number

  constructor(status: number, message: string) {
    super(message, 2)
    this.status = status
  }
}

export class ReauthRequiredError extends ListenError {
  constructor(message = 'Session expired') {
    super(message, 3, 'Log in again and re-run listen')
  }
}

/** Outbound queue stayed full past the send deadline */
export class OverloadedError extends Error {
  constructor(message = 'Outbound queue is full') {
    super(message)
    this.name = 'OverloadedError'
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
