import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { DiskConfigDocument, DiskMonitorConfig } from '../types/disk.types';
import { parseJsonc } from '../utils/jsonc.utils';
import { describeError } from '../utils/error.utils';
import { diskConfigDocumentSchema } from './validation.schema';
import { createDefaultDiskConfig } from './defaults';

/**
 * Map a validated document onto the runtime config. Leaves the document
 * omits take their zero value; they are not merged with the defaults.
 */
export function toDiskMonitorConfig(doc: DiskConfigDocument): DiskMonitorConfig {
  return {
    thresholds: {
      warningPercent: doc.thresholds?.warning_percent ?? 0,
      criticalPercent: doc.thresholds?.critical_percent ?? 0,
    },
    display: {
      headerIcon: doc.display?.header_icon ?? '',
      headerText: doc.display?.header_text ?? '',
      showWhenHealthy: doc.display?.show_when_healthy ?? false,
      healthyMessageTemplate: doc.display?.healthy_message ?? '',
    },
    messages: {
      warningTemplate: doc.messages?.warning ?? '',
      criticalTemplate: doc.messages?.critical ?? '',
    },
    behavior: {
      enabled: doc.behavior?.enabled ?? false,
      checkOnSessionStart: doc.behavior?.check_on_session_start ?? false,
    },
  };
}

function freezeConfig(config: DiskMonitorConfig): DiskMonitorConfig {
  Object.freeze(config.thresholds);
  Object.freeze(config.display);
  Object.freeze(config.messages);
  Object.freeze(config.behavior);
  return Object.freeze(config);
}

@Injectable()
export class DiskConfigStore {
  private readonly logger = new Logger(DiskConfigStore.name);

  /**
   * Never throws. Any read, parse or shape failure yields the complete
   * default config. The returned object is frozen.
   */
  load(configPath: string | null): DiskMonitorConfig {
    if (!configPath) {
      this.logger.debug('No config path (HOME unset), using defaults');
      return freezeConfig(createDefaultDiskConfig());
    }

    let raw: string;
    try {
      raw = readFileSync(configPath, 'utf8');
    } catch (e) {
      this.logger.debug(`Config not readable at ${configPath}: ${describeError(e)}`);
      return freezeConfig(createDefaultDiskConfig());
    }

    const doc = this.parseDocument(raw, configPath);
    if (!doc) {
      return freezeConfig(createDefaultDiskConfig());
    }

    this.logger.debug(`Loaded config from ${configPath}`);
    return freezeConfig(toDiskMonitorConfig(doc));
  }

  private parseDocument(raw: string, configPath: string): DiskConfigDocument | null {
    let parsed: unknown;
    try {
      parsed = parseJsonc(raw);
    } catch (e) {
      this.logger.warn(`Malformed config at ${configPath}, using defaults: ${describeError(e)}`);
      return null;
    }

    const result = diskConfigDocumentSchema.validate(parsed, { abortEarly: false });
    if (result.error) {
      this.logger.warn(`Invalid config at ${configPath}, using defaults: ${result.error.message}`);
      return null;
    }
    return result.value ?? null;
  }
}
