import 'reflect-metadata';

// Module
export * from './disk-monitor.module';

// Types
export * from './types/disk.types';
export * from './types/presenter.types';
export * from './types/hook.types';

// Config
export * from './config/configuration';
export * from './config/validation.schema';
export * from './config/defaults';
export * from './config/config-store';

// Services
export * from './disk/disk.tokens';
export * from './disk/disk-check.service';
export * from './disk/disk-usage.service';
export * from './disk/console.presenter';

// Logging
export * from './logging/stderr.logger';

// Utils
export * from './utils/jsonc.utils';
export * from './utils/severity.utils';
export * from './utils/message-template.utils';
export * from './utils/format.utils';
export * from './utils/error.utils';
export * from './utils/hook-input.utils';

// Constants
export * from './constants/status-icons';
