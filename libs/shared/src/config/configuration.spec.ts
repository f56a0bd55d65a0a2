import { join, resolve } from 'path';
import { resolveConfigPath, resolveLogLevel } from './configuration';

describe('resolveConfigPath', () => {
  it('should build the path under HOME', () => {
    expect(resolveConfigPath({ HOME: '/home/tester' })).toBe(
      join('/home/tester', '.claude', 'hooks', 'config', 'disk-monitoring.jsonc'),
    );
  });

  it('should prefer DISK_MONITOR_CONFIG', () => {
    expect(
      resolveConfigPath({ HOME: '/home/tester', DISK_MONITOR_CONFIG: 'conf/disk.jsonc' }),
    ).toBe(resolve('conf/disk.jsonc'));
  });

  it('should return null without HOME or override', () => {
    expect(resolveConfigPath({})).toBeNull();
    expect(resolveConfigPath({ HOME: '' })).toBeNull();
  });
});

describe('resolveLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel(' WARN ')).toBe('warn');
  });

  it('should default to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});
