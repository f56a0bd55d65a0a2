/**
 * Icons used in disk status output.
 */
export const DISK_ICON = '\u{1F4BE}'; // 💾
export const ALERT_ICON = '\u{26A0}\u{FE0F}'; // ⚠️

export const STATUS_ICONS = {
  success: '\u{2713}', // ✓
  warning: '\u{26A0}', // ⚠
  failure: '\u{2717}', // ✗
} as const;
