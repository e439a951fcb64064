/**
 * Common error messages.
 */

import { joinLines } from '@/ui/formatting.js';

export function genericError(message: string): string {
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * "Server not reachable" message for the client commands.
 *
 * @example
 * ```typescript
 * console.error(serverNotRunningError('127.0.0.1:9877'));
 * ```
 */
export function serverNotRunningError(endpoint: string): string {
  return joinLines(
    `Error: No mixcast server at ${endpoint}`,
    '',
    'Suggestions:',
    '  Start one:       mixcast serve',
    '  Different port:  mixcast call <type> --port <n>'
  );
}

/**
 * Unknown command name, with the closest catalog names.
 */
export function unknownCommandError(name: string, suggestions: string[]): string {
  return joinLines(
    `Unknown command: ${name}`,
    suggestions.length > 0 && `Did you mean: ${suggestions.join(', ')}?`
  );
}

/**
 * A command that may only travel over the reliable channel was given to cast.
 */
export function castNotAllowedError(name: string): string {
  return `${name} cannot be sent over the lossy channel`;
}
