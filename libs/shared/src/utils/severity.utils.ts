import { SeverityLevel, ThresholdSet } from '../types/disk.types';

type AlertLevel = Exclude<SeverityLevel, 'healthy'>;

/**
 * Levels are tested most severe first. When thresholds overlap
 * (critical <= warning) a reading that meets both is critical.
 */
export const SEVERITY_EVALUATION_ORDER: readonly AlertLevel[] = ['critical', 'warning'];

function thresholdFor(level: AlertLevel, thresholds: ThresholdSet): number {
  return level === 'critical' ? thresholds.criticalPercent : thresholds.warningPercent;
}

export function classifySeverity(
  usagePercent: number,
  thresholds: ThresholdSet,
): SeverityLevel {
  for (const level of SEVERITY_EVALUATION_ORDER) {
    if (usagePercent >= thresholdFor(level, thresholds)) {
      return level;
    }
  }
  return 'healthy';
}
