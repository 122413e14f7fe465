import { useSyncExternalStore } from 'react'
import type { AppSnapshot, TypingApp } from '../lib/typingApp'

export function useAppSnapshot(app: Pick<TypingApp, 'subscribe' | 'getSnapshot'>): AppSnapshot {
  return useSyncExternalStore(app.subscribe, app.getSnapshot, app.getSnapshot)
}
