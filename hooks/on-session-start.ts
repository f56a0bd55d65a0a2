#!/usr/bin/env node
import 'reflect-metadata';
import './utils/env-loader';
import { Logger } from '@nestjs/common';
import { readHookInput } from './utils/stdin-reader';
import { runSessionStartCheck } from './utils/disk-check-runner';
import { CONFIG_PATH, LOG_LEVEL } from './utils/env-loader';
import {
  StderrLogger,
  toNestLogLevels,
} from '../libs/shared/src/logging/stderr.logger';

async function main(): Promise<void> {
  Logger.overrideLogger(
    new StderrLogger('Hook', { logLevels: toNestLogLevels(LOG_LEVEL) }),
  );

  const input = await readHookInput();
  await runSessionStartCheck(input, { configPath: CONFIG_PATH, env: process.env });
}

main().catch((e) => console.error('[Hook:on-session-start]', e)).finally(() => process.exit(0));
