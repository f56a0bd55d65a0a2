import { Injectable } from '@nestjs/common';
import checkDiskSpace from 'check-disk-space';
import { UsageSnapshot } from '../types/disk.types';
import { DiskUsageProvider } from '../types/presenter.types';
import { formatBytes } from '../utils/format.utils';

@Injectable()
export class DiskUsageService implements DiskUsageProvider {
  async getUsage(path: string): Promise<UsageSnapshot> {
    const { size, free } = await checkDiskSpace(path);
    if (!(size > 0)) {
      throw new Error(`Filesystem holding ${path} reports no capacity`);
    }

    const used = Math.max(size - free, 0);
    return {
      usagePercent: (used / size) * 100,
      used: formatBytes(used),
      available: formatBytes(free),
      total: formatBytes(size),
    };
  }
}
