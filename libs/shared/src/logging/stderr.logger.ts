import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { LogLevelName } from '../config/configuration';

const NEST_LOG_LEVELS: Record<LogLevelName, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

export function toNestLogLevels(level: LogLevelName): LogLevel[] {
  return NEST_LOG_LEVELS[level];
}

/**
 * Console logger that writes every level to stderr. Hook stdout is
 * reserved for the messages shown to the user.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
