import { Injectable } from '@nestjs/common';
import chalk from 'chalk';
import { DisplayStyle, Presenter } from '../types/presenter.types';
import { STATUS_ICONS } from '../constants/status-icons';

const MESSAGE_INDENT = '   ';

/**
 * Writes disk status lines to stdout. Nothing else in the check writes
 * to stdout, so hook hosts can forward it verbatim.
 */
@Injectable()
export class ConsolePresenter implements Presenter {
  emit(text: string, style: DisplayStyle): void {
    const line = this.format(text, style);
    if (line) {
      console.log(line);
    }
  }

  format(text: string, style: DisplayStyle): string {
    if (!text) return '';

    switch (style) {
      case 'header':
        return chalk.bold.cyan(`${text}:`);
      case 'success':
        return MESSAGE_INDENT + chalk.green(`${STATUS_ICONS.success} ${text}`);
      case 'warning':
        return MESSAGE_INDENT + chalk.yellow(`${STATUS_ICONS.warning} ${text}`);
      case 'failure':
        return MESSAGE_INDENT + chalk.red(`${STATUS_ICONS.failure} ${text}`);
    }
  }
}
