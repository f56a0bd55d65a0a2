import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { diskMonitorConfig } from './config/configuration';
import { envValidationSchema } from './config/validation.schema';
import { DiskConfigStore } from './config/config-store';
import { DiskUsageService } from './disk/disk-usage.service';
import { ConsolePresenter } from './disk/console.presenter';
import { DiskCheckService } from './disk/disk-check.service';
import {
  DISK_MONITOR_CONFIG,
  DISK_USAGE_PROVIDER,
  PRESENTER,
} from './disk/disk.tokens';

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [diskMonitorConfig],
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
  ],
  providers: [
    DiskConfigStore,
    {
      provide: DISK_MONITOR_CONFIG,
      useFactory: (
        store: DiskConfigStore,
        cfg: ConfigType<typeof diskMonitorConfig>,
      ) => store.load(cfg.configPath),
      inject: [DiskConfigStore, diskMonitorConfig.KEY],
    },
    { provide: DISK_USAGE_PROVIDER, useClass: DiskUsageService },
    { provide: PRESENTER, useClass: ConsolePresenter },
    DiskCheckService,
  ],
  exports: [DiskCheckService, DISK_MONITOR_CONFIG],
})
export class DiskMonitorModule {}
