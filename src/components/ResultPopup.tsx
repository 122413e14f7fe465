import { Box, Text } from 'ink';
import type { LayoutPalette } from '../lib/layouts';
import { formatAccuracy, formatWpm } from '../lib/statsSummary';
import type { Stat } from '../types';

interface ResultPopupProps {
  result: Stat;
  palette: LayoutPalette;
}

export function ResultPopup({ result, palette }: ResultPopupProps) {
  const title = result.outcome === 'completed' ? 'Text completed' : 'Time is up';

  return (
    <Box
      flexDirection="column"
      alignItems="center"
      alignSelf="center"
      borderStyle="double"
      borderColor={palette.incorrect}
      paddingX={4}
      marginY={1}
    >
      <Text color={palette.primary} bold>
        {title}
      </Text>
      <Text color={palette.text}>
        {formatWpm(result.averageWpm)} wpm, {formatAccuracy(result.accuracy)} accuracy
      </Text>
      <Text color={palette.text}>{result.errorCount} errors</Text>
      <Text color={palette.secondary}>^R to try again</Text>
    </Box>
  );
}
