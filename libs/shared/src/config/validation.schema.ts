import * as Joi from 'joi';
import { DiskConfigDocument } from '../types/disk.types';

const percent = Joi.number().min(0).max(100);
const text = Joi.string().allow('');

/**
 * Shape of disk-monitoring.jsonc. Sections and leaves are optional,
 * types are not coerced, and unknown keys (metadata, description,
 * reasoning) are ignored.
 */
export const diskConfigDocumentSchema = Joi.object<DiskConfigDocument>({
  thresholds: Joi.object({
    warning_percent: percent,
    critical_percent: percent,
  }),
  display: Joi.object({
    header_icon: text,
    header_text: text,
    show_when_healthy: Joi.boolean(),
    healthy_message: text,
  }),
  messages: Joi.object({
    warning: text,
    critical: text,
  }),
  behavior: Joi.object({
    enabled: Joi.boolean(),
    check_on_session_start: Joi.boolean(),
  }),
}).options({ allowUnknown: true, convert: false });

export const envValidationSchema = Joi.object({
  HOME: Joi.string().optional(),
  DISK_MONITOR_CONFIG: Joi.string().optional().allow(''),
  CLAUDE_PROJECT_DIR: Joi.string().optional().allow(''),

  // Optional - Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
}).options({ allowUnknown: true });
