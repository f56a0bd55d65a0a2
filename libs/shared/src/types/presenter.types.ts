import { UsageSnapshot } from './disk.types';

export type DisplayStyle = 'header' | 'success' | 'warning' | 'failure';

/** Renders plain strings for the user. */
export interface Presenter {
  emit(text: string, style: DisplayStyle): void;
}

/** Reads usage of the filesystem that holds `path`. May reject. */
export interface DiskUsageProvider {
  getUsage(path: string): Promise<UsageSnapshot>;
}
