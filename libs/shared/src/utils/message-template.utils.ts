import { UsageSnapshot } from '../types/disk.types';

export const MESSAGE_PLACEHOLDERS = ['percent', 'available', 'used', 'total'] as const;
export type MessagePlaceholder = (typeof MESSAGE_PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = new RegExp(`\\{(${MESSAGE_PLACEHOLDERS.join('|')})\\}`, 'g');

function isPlaceholder(name: string): name is MessagePlaceholder {
  return MESSAGE_PLACEHOLDERS.some((p) => p === name);
}

export function placeholderValues(
  snapshot: UsageSnapshot,
): Record<MessagePlaceholder, string> {
  return {
    percent: snapshot.usagePercent.toFixed(0),
    available: snapshot.available,
    used: snapshot.used,
    total: snapshot.total,
  };
}

/**
 * Substitute {percent}, {available}, {used} and {total} in one pass.
 * Any other `{token}` is left as written, and substituted values are
 * never scanned again.
 */
export function renderMessage(template: string, snapshot: UsageSnapshot): string {
  const values = placeholderValues(snapshot);
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string) =>
    isPlaceholder(name) ? values[name] : match,
  );
}
