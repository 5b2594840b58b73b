import type { Argv } from 'yargs';

/** Connection flags shared by every command. */
export interface ConnectionCliOptions {
  socket?: string;
  appClass?: string;
  timeout?: number;
  validateSocket?: boolean;
}

export function addConnectionOptions<T>(y: Argv<T>) {
  return y
    .option('socket', {
      type: 'string',
      describe: 'Ghostty control socket path (defaults to the per-user runtime socket)',
    })
    .option('app-class', {
      type: 'string',
      describe: 'Address an alternate Ghostty app class',
    })
    .option('timeout', {
      type: 'number',
      describe: 'Per-request timeout in milliseconds',
    })
    .option('validate-socket', {
      type: 'boolean',
      describe: 'Check socket ownership and permissions before connecting (use --no-validate-socket to skip)',
    });
}
