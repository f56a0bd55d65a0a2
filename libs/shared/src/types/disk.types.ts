export interface ThresholdSet {
  warningPercent: number;
  criticalPercent: number;
}

export interface DisplayPreferences {
  headerIcon: string;
  headerText: string;
  showWhenHealthy: boolean;
  healthyMessageTemplate: string;
}

export interface MessageTemplates {
  warningTemplate: string;
  criticalTemplate: string;
}

export interface BehaviorFlags {
  enabled: boolean;
  /** Read by the session-start hook, not by the check itself. */
  checkOnSessionStart: boolean;
}

export interface DiskMonitorConfig {
  thresholds: ThresholdSet;
  display: DisplayPreferences;
  messages: MessageTemplates;
  behavior: BehaviorFlags;
}

/**
 * Point-in-time usage reading for one filesystem.
 * Size fields are already formatted for display (e.g. "150GB").
 */
export interface UsageSnapshot {
  usagePercent: number;
  used: string;
  available: string;
  total: string;
}

export type SeverityLevel = 'healthy' | 'warning' | 'critical';

/**
 * On-disk shape of disk-monitoring.jsonc. Every field is optional;
 * a missing leaf takes its zero value when mapped to DiskMonitorConfig.
 */
export interface DiskConfigDocument {
  thresholds?: {
    warning_percent?: number;
    critical_percent?: number;
  };
  display?: {
    header_icon?: string;
    header_text?: string;
    show_when_healthy?: boolean;
    healthy_message?: string;
  };
  messages?: {
    warning?: string;
    critical?: string;
  };
  behavior?: {
    enabled?: boolean;
    check_on_session_start?: boolean;
  };
}
