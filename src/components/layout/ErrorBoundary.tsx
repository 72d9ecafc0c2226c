import { Component, type ReactNode } from 'react'

interface ErrorBoundaryProps {
  children: ReactNode
  onError: (error: Error) => void
}

interface ErrorBoundaryState {
  failed: boolean
}

/** Renders nothing after a render error and reports it once. */
export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { failed: false }

  static getDerivedStateFromError(): ErrorBoundaryState {
    return { failed: true }
  }

  componentDidCatch(error: Error): void {
    this.props.onError(error)
  }

  render() {
    return this.state.failed ? null : this.props.children
  }
}
