import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DiskMonitorConfig,
  SeverityLevel,
  UsageSnapshot,
} from '../types/disk.types';
import {
  DiskUsageProvider,
  DisplayStyle,
  Presenter,
} from '../types/presenter.types';
import { classifySeverity } from '../utils/severity.utils';
import { renderMessage } from '../utils/message-template.utils';
import { describeError } from '../utils/error.utils';
import {
  DISK_MONITOR_CONFIG,
  DISK_USAGE_PROVIDER,
  PRESENTER,
} from './disk.tokens';

const SEVERITY_STYLES: Record<SeverityLevel, DisplayStyle> = {
  critical: 'failure',
  warning: 'warning',
  healthy: 'success',
};

@Injectable()
export class DiskCheckService {
  private readonly logger = new Logger(DiskCheckService.name);

  constructor(
    @Inject(DISK_MONITOR_CONFIG)
    private readonly config: DiskMonitorConfig,
    @Inject(DISK_USAGE_PROVIDER)
    private readonly usageProvider: DiskUsageProvider,
    @Inject(PRESENTER)
    private readonly presenter: Presenter,
  ) {}

  /**
   * Report disk usage of `workspace` when it crosses a threshold.
   * Resolves without output on any failure; never rejects.
   */
  async check(workspace: string): Promise<void> {
    if (!this.config.behavior.enabled) return;

    let snapshot: UsageSnapshot;
    try {
      snapshot = await this.usageProvider.getUsage(workspace);
    } catch (e) {
      this.logger.debug(`Disk usage unavailable for ${workspace}: ${describeError(e)}`);
      return;
    }

    const severity = classifySeverity(snapshot.usagePercent, this.config.thresholds);
    this.logger.debug(
      `${workspace}: ${snapshot.usagePercent.toFixed(1)}% used -> ${severity}`,
    );

    const template = this.templateFor(severity);
    if (template === null) return;

    try {
      this.presenter.emit(this.headerText(), 'header');
      this.presenter.emit(renderMessage(template, snapshot), SEVERITY_STYLES[severity]);
    } catch (e) {
      this.logger.error(`Failed to display disk status: ${describeError(e)}`);
    }
  }

  private templateFor(severity: SeverityLevel): string | null {
    switch (severity) {
      case 'critical':
        return this.config.messages.criticalTemplate;
      case 'warning':
        return this.config.messages.warningTemplate;
      case 'healthy':
        return this.config.display.showWhenHealthy
          ? this.config.display.healthyMessageTemplate
          : null;
    }
  }

  private headerText(): string {
    const { headerIcon, headerText } = this.config.display;
    return [headerIcon, headerText].filter(Boolean).join(' ');
  }
}
