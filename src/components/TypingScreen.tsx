import { Box, Text } from 'ink';
import type { LayoutPalette } from '../lib/layouts';
import { toTextRuns, type TextRun } from '../lib/textRuns';
import type { SessionSnapshot } from '../lib/typingSession';

interface TypingScreenProps {
  session: SessionSnapshot;
  palette: LayoutPalette;
  transparentBackground: boolean;
  remainingSecs: number;
  active: boolean;
}

function runColor(run: TextRun, palette: LayoutPalette): string {
  switch (run.kind) {
    case 'correct':
      return palette.correct;
    case 'incorrect':
      return palette.incorrect;
    case 'pending':
    case 'cursor':
      return palette.pending;
  }
}

export function TypingScreen({
  session,
  palette,
  transparentBackground,
  remainingSecs,
  active,
}: TypingScreenProps) {
  const runs = toTextRuns(session.characters, session.cursor);
  const backgroundColor = transparentBackground ? undefined : palette.background;

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={active ? palette.primary : palette.secondary}
      paddingX={2}
      paddingY={1}
    >
      <Box marginBottom={1} justifyContent="space-between">
        <Text color={palette.primary} bold>
          {remainingSecs}s
        </Text>
        <Text color={palette.secondary}>
          errors {session.errorCount}
        </Text>
      </Box>
      <Text wrap="wrap" backgroundColor={backgroundColor}>
        {runs.map((run, index) => (
          <Text
            key={index}
            color={runColor(run, palette)}
            inverse={run.kind === 'cursor'}
            underline={run.kind === 'incorrect'}
          >
            {run.text}
          </Text>
        ))}
      </Text>
    </Box>
  );
}
