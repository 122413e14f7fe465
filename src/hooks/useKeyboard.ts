import { useInput } from 'ink'
import type { KeyInput } from '../types'
import { toKeyInputs } from '../lib/terminalKeys'

export function useKeyboard(onKey: (key: KeyInput) => void, isActive = true): void {
  useInput(
    (input, key) => {
      for (const keyInput of toKeyInputs(input, key)) {
        onKey(keyInput)
      }
    },
    { isActive }
  )
}
