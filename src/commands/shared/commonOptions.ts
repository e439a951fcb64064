import { Option } from 'commander';

import {
  CALL_TIMEOUT_MS,
  DEFAULT_HOST,
  DEFAULT_TCP_PORT,
  DEFAULT_UDP_PORT,
  ENV,
  MAX_CALL_TIMEOUT_MS,
} from '@/constants.js';

import { positiveIntRule } from './validation.js';

const portRule = positiveIntRule({ name: 'port', min: 0, max: 65535 });

/**
 * Shared --json flag for machine-readable output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Host both channels live on. Defaults to MIXCAST_HOST, then 127.0.0.1.
 */
export function hostOption(): Option {
  return new Option('--host <host>', 'Server host').env(ENV.HOST).default(DEFAULT_HOST);
}

/**
 * Reliable (TCP) port option. Port 0 is accepted for `serve` (ephemeral).
 * Commander runs the parser on MIXCAST_TCP_PORT too.
 */
export function tcpPortOption(): Option {
  return new Option('-p, --port <n>', 'Reliable (TCP) port')
    .env(ENV.TCP_PORT)
    .default(DEFAULT_TCP_PORT)
    .argParser((value) => portRule.validate(value));
}

/**
 * Lossy (UDP) port option.
 */
export function udpPortOption(): Option {
  return new Option('-u, --udp-port <n>', 'Lossy (UDP) port')
    .env(ENV.UDP_PORT)
    .default(DEFAULT_UDP_PORT)
    .argParser((value) => portRule.validate(value));
}

/**
 * Call timeout in milliseconds.
 *
 * @example
 * ```typescript
 * program.command('call').addOption(timeoutOption());
 * ```
 */
export function timeoutOption(): Option {
  const rule = positiveIntRule({ name: 'timeout', min: 1, max: MAX_CALL_TIMEOUT_MS });
  return new Option('-t, --timeout <ms>', 'Call timeout in milliseconds')
    .env(ENV.CALL_TIMEOUT_MS)
    .default(CALL_TIMEOUT_MS)
    .argParser((value) => rule.validate(value));
}
