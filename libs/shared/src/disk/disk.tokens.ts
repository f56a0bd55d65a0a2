export const DISK_MONITOR_CONFIG = Symbol('DISK_MONITOR_CONFIG');
export const DISK_USAGE_PROVIDER = Symbol('DISK_USAGE_PROVIDER');
export const PRESENTER = Symbol('PRESENTER');
