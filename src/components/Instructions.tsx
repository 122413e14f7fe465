import { Box, Text } from 'ink';
import { GLOBAL_KEY_HINTS } from '../lib/keyBindings';
import type { LayoutPalette } from '../lib/layouts';
import type { ScreenId } from '../types';

interface InstructionsProps {
  activeScreen: ScreenId;
  palette: LayoutPalette;
}

export function Instructions({ activeScreen, palette }: InstructionsProps) {
  const navigation = activeScreen === 'typing' ? '<Right> Stats' : '<Left> Typing';

  return (
    <Box justifyContent="center" gap={2}>
      <Text color={palette.primary}>{'<Esc> Exit'}</Text>
      <Text color={palette.primary}>{navigation}</Text>
      {GLOBAL_KEY_HINTS.map((hint) => (
        <Text key={hint.keys} color={palette.secondary}>
          {hint.keys} {hint.label}
        </Text>
      ))}
    </Box>
  );
}
