import type { Stat, TypingDuration } from '../types';
import { durationLabel } from './typingDuration';

export interface StatsSummary {
  sessionCount: number;
  averageWpm: number;
  bestWpm: number;
  averageAccuracy: number;
  totalErrors: number;
}

export function summarizeStats(stats: readonly Stat[]): StatsSummary {
  if (stats.length === 0) {
    return { sessionCount: 0, averageWpm: 0, bestWpm: 0, averageAccuracy: 0, totalErrors: 0 };
  }

  let wpmTotal = 0;
  let accuracyTotal = 0;
  let bestWpm = 0;
  let totalErrors = 0;
  for (const stat of stats) {
    wpmTotal += stat.averageWpm;
    accuracyTotal += stat.accuracy;
    bestWpm = Math.max(bestWpm, stat.averageWpm);
    totalErrors += stat.errorCount;
  }

  return {
    sessionCount: stats.length,
    averageWpm: wpmTotal / stats.length,
    bestWpm,
    averageAccuracy: accuracyTotal / stats.length,
    totalErrors,
  };
}

export function formatWpm(wpm: number): string {
  return wpm.toFixed(1);
}

export function formatAccuracy(accuracy: number): string {
  return `${Math.round(accuracy * 100)}%`;
}

export function formatDuration(duration: TypingDuration): string {
  return durationLabel(duration);
}

export function formatElapsed(elapsedSecs: number): string {
  const minutes = Math.floor(elapsedSecs / 60);
  const seconds = elapsedSecs % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

/** Labels for the summary row above the history list. */
export function formatSummary(summary: StatsSummary): string[] {
  return [
    `${summary.sessionCount} sessions`,
    `avg ${formatWpm(summary.averageWpm)} wpm`,
    `best ${formatWpm(summary.bestWpm)} wpm`,
    `accuracy ${formatAccuracy(summary.averageAccuracy)}`,
    `${summary.totalErrors} errors`,
  ];
}
