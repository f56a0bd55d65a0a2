import { HookInput } from '../../libs/shared/src/types/hook.types';
import {
  DiskUsageProvider,
  Presenter,
} from '../../libs/shared/src/types/presenter.types';
import { DiskConfigStore } from '../../libs/shared/src/config/config-store';
import { DiskCheckService } from '../../libs/shared/src/disk/disk-check.service';
import { DiskUsageService } from '../../libs/shared/src/disk/disk-usage.service';
import { ConsolePresenter } from '../../libs/shared/src/disk/console.presenter';

export interface DiskCheckRunnerOptions {
  configPath: string | null;
  env: NodeJS.ProcessEnv;
  usageProvider?: DiskUsageProvider;
  presenter?: Presenter;
}

export function resolveWorkspace(input: HookInput, env: NodeJS.ProcessEnv): string {
  return input.cwd || env.CLAUDE_PROJECT_DIR || process.cwd();
}

export async function runSessionStartCheck(
  input: HookInput,
  options: DiskCheckRunnerOptions,
): Promise<void> {
  const config = new DiskConfigStore().load(options.configPath);
  if (!config.behavior.checkOnSessionStart) return;

  const service = new DiskCheckService(
    config,
    options.usageProvider ?? new DiskUsageService(),
    options.presenter ?? new ConsolePresenter(),
  );
  await service.check(resolveWorkspace(input, options.env));
}
