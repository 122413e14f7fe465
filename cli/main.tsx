import { render } from 'ink'
import { App } from '../src/components/App'
import { createConfigStore } from '../src/lib/appConfig'
import { runEventLoop } from '../src/lib/eventLoop'
import { EventQueue } from '../src/lib/eventQueue'
import { generateText, wordCountForDuration } from '../src/lib/textGenerator'
import { startTicker } from '../src/lib/ticker'
import { TypingApp } from '../src/lib/typingApp'
import type { AppEvent } from '../src/types'
import { resolveAppPaths } from './lib/paths'
import { loadSettings, saveSettings } from './lib/settingsFile'
import { StatsStore } from './lib/statsStore'
import { loadWordList } from './lib/wordLists'

async function main(): Promise<void> {
  const paths = resolveAppPaths(process.env)

  const config = createConfigStore(loadSettings(paths.settingsFile))
  config.subscribe((state, previous) => {
    if (state.config !== previous.config) {
      saveSettings(paths.settingsFile, state.config)
    }
  })

  const stats = new StatsStore(paths.statsFile).init()
  const app = new TypingApp({
    config,
    stats,
    generateText: (duration, language) =>
      generateText(loadWordList(language), wordCountForDuration(duration)),
  })

  const events = new EventQueue<AppEvent>()
  const ui = render(<App app={app} onKey={(key) => events.push({ type: 'key', key })} />, {
    exitOnCtrlC: false,
  })
  const stopTicker = startTicker(events)

  try {
    await runEventLoop(app, events)
  } finally {
    stopTicker()
    events.close()
    ui.unmount()
  }
}

main().catch((err: unknown) => {
  console.error('tapline stopped with an error:', err)
  process.exitCode = 1
})
