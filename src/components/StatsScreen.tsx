import { Box, Text } from 'ink';
import type { LayoutPalette } from '../lib/layouts';
import {
  formatAccuracy,
  formatDuration,
  formatElapsed,
  formatSummary,
  formatWpm,
} from '../lib/statsSummary';
import type { StatsView } from '../lib/typingApp';

const VISIBLE_ROWS = 12;

interface StatsScreenProps {
  stats: StatsView;
  palette: LayoutPalette;
  active: boolean;
}

/**
 * History of finished sessions, most recent first, with totals on top.
 */
export function StatsScreen({ stats, palette, active }: StatsScreenProps) {
  const { entries, summary, scrollOffset } = stats;
  const visible = entries.slice(scrollOffset, scrollOffset + VISIBLE_ROWS);
  const [sessions, ...totals] = formatSummary(summary);

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={active ? palette.primary : palette.secondary}
      paddingX={2}
      paddingY={1}
    >
      <Box marginBottom={1} gap={3}>
        <Text color={palette.primary} bold>
          {sessions}
        </Text>
        {totals.map((label) => (
          <Text key={label} color={palette.text}>
            {label}
          </Text>
        ))}
      </Box>

      {entries.length === 0 ? (
        <Text color={palette.secondary}>No sessions yet. Finish a test to see it here.</Text>
      ) : (
        visible.map((stat, index) => (
          <Box key={`${stat.finishedAt}-${scrollOffset + index}`} gap={3}>
            <Text color={palette.secondary}>{formatDuration(stat.duration).padEnd(3)}</Text>
            <Text color={palette.text}>{formatWpm(stat.averageWpm).padStart(6)} wpm</Text>
            <Text color={palette.text}>{formatAccuracy(stat.accuracy).padStart(4)}</Text>
            <Text color={stat.errorCount > 0 ? palette.incorrect : palette.correct}>
              {stat.errorCount} errors
            </Text>
            <Text color={palette.secondary}>{formatElapsed(stat.elapsedSecs)}</Text>
          </Box>
        ))
      )}
    </Box>
  );
}
