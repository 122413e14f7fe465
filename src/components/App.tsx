import { Box, Text } from 'ink';
import { useAppSnapshot } from '../hooks/useAppSnapshot';
import { useKeyboard } from '../hooks/useKeyboard';
import { getLayoutPalette } from '../lib/layouts';
import { durationLabel } from '../lib/typingDuration';
import type { TypingApp } from '../lib/typingApp';
import type { KeyInput } from '../types';
import { Instructions } from './Instructions';
import { ResultPopup } from './ResultPopup';
import { StatsScreen } from './StatsScreen';
import { TypingScreen } from './TypingScreen';

interface AppProps {
  app: Pick<TypingApp, 'subscribe' | 'getSnapshot'>;
  onKey: (key: KeyInput) => void;
}

export function App({ app, onKey }: AppProps) {
  const snapshot = useAppSnapshot(app);
  const { config, activeScreen, screens } = snapshot;
  const palette = getLayoutPalette(config.layout);

  useKeyboard(onKey, !snapshot.exitRequested);

  return (
    <Box flexDirection="column">
      <Box justifyContent="space-between" paddingX={1}>
        <Text color={palette.primary} bold>
          tapline
        </Text>
        <Text color={palette.secondary}>
          {durationLabel(config.typingDuration)} · {config.language} · {config.layout}
        </Text>
      </Box>

      {activeScreen === 'typing' ? (
        <TypingScreen
          session={snapshot.session}
          palette={palette}
          transparentBackground={config.transparentBackground}
          remainingSecs={snapshot.remainingSecs}
          active={screens.typing.active}
        />
      ) : (
        <StatsScreen stats={snapshot.stats} palette={palette} active={screens.stats.active} />
      )}

      {snapshot.popupVisible && snapshot.lastResult && (
        <ResultPopup result={snapshot.lastResult} palette={palette} />
      )}

      {snapshot.notice && (
        <Box justifyContent="center">
          <Text color={palette.incorrect}>{snapshot.notice}</Text>
        </Box>
      )}

      <Instructions activeScreen={activeScreen} palette={palette} />
    </Box>
  );
}
