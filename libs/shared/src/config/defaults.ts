import { DiskMonitorConfig } from '../types/disk.types';
import { ALERT_ICON, DISK_ICON } from '../constants/status-icons';

export const DEFAULT_USAGE_MESSAGE =
  'Disk space: {percent}% used ({available} available)';

/**
 * Complete configuration used whenever disk-monitoring.jsonc is absent,
 * unreadable or malformed. Returns a fresh object on every call.
 */
export function createDefaultDiskConfig(): DiskMonitorConfig {
  return {
    thresholds: {
      warningPercent: 80,
      criticalPercent: 95,
    },
    display: {
      headerIcon: DISK_ICON,
      headerText: 'Disk Space Status',
      showWhenHealthy: false,
      healthyMessageTemplate: DEFAULT_USAGE_MESSAGE,
    },
    messages: {
      warningTemplate: DEFAULT_USAGE_MESSAGE,
      criticalTemplate: `${ALERT_ICON}  CRITICAL: Disk nearly full - {percent}% used (only {available} remaining)`,
    },
    behavior: {
      enabled: true,
      checkOnSessionStart: true,
    },
  };
}
