import { config } from 'dotenv';
import { resolve } from 'path';
import {
  resolveConfigPath,
  resolveLogLevel,
} from '../../libs/shared/src/config/configuration';

config({ path: resolve(process.cwd(), '.env'), quiet: true });

export const CONFIG_PATH = resolveConfigPath(process.env);
export const LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);
