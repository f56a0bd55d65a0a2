import { HookInput } from '../../libs/shared/src/types/hook.types';
import { parseHookInput } from '../../libs/shared/src/utils/hook-input.utils';

export function readHookInput(): Promise<HookInput> {
  return new Promise((resolve) => {
    let data = '';
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk: string) => { data += chunk; });
    process.stdin.on('end', () => {
      resolve(parseHookInput(data));
    });
    process.stdin.on('error', () => {
      resolve({});
    });
  });
}
