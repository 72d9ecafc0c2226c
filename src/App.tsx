import { useCallback } from 'react'
import { Box, useInput } from 'ink'
import { useHistory, useLiveState } from './hooks/index.js'
import type { HistoryStore } from './lib/history.js'
import type { LiveStateStore } from './lib/live-state.js'
import type { ListenActions } from './lib/actions.js'
import { describeError } from '../cli/errors.js'
import { Header, type HeaderInfo } from './components/layout/Header.js'
import { SourcesPanel } from './components/layout/SourcesPanel.js'
import { StatusLine } from './components/layout/StatusLine.js'
import { HistoryList } from './components/history/HistoryList.js'
import { DetailPane } from './components/detail/DetailPane.js'

export interface AppProps {
  history: HistoryStore
  live: LiveStateStore
  info: HeaderInfo
  actions: ListenActions
  onQuit: () => void
  /** Rows given to the history list */
  historyHeight?: number
  /** Redraw throttle, in ms */
  frameIntervalMs?: number
}

function App({ history, live, info, actions, onQuit, historyHeight = 10, frameIntervalMs }: AppProps) {
  const { entries, selectedIndex, userNavigated, selected, showDetails, navigate, toggleDetails } =
    useHistory(history, frameIntervalMs)
  const state = useLiveState(live, frameIntervalMs)

  const runAction = useCallback((action: Promise<string>) => {
    action
      .then(message => live.update({ message }))
      .catch(err => live.update({ message: describeError(err) }))
  }, [live])

  useInput((input, key) => {
    if (key.upArrow) {
      navigate(-1)
    } else if (key.downArrow) {
      navigate(1)
    } else if (input === 'd') {
      toggleDetails()
    } else if (input === 'r' && selected) {
      runAction(actions.retry(selected))
    } else if (input === 'o' && selected) {
      runAction(actions.open(selected))
    } else if (input === 'q' || (key.ctrl && input === 'c')) {
      onQuit()
    }
  })

  return (
    <Box flexDirection="column">
      <Header info={info} transport={state.transport} inFlight={state.inFlight} notice={state.notice} />
      <SourcesPanel routes={state.routes} />
      {showDetails && selected ? (
        <DetailPane entry={selected} />
      ) : (
        <HistoryList
          entries={entries}
          selectedIndex={selectedIndex}
          height={historyHeight}
          connected={state.transport.state === 'open'}
        />
      )}
      <StatusLine selected={selected} userNavigated={userNavigated} message={state.message} />
    </Box>
  )
}

export default App
