/**
 * Error handling for the mixcast CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
export { isConnectionError } from '@/client/errors.js';
export { getErrorMessage } from '@/utils/errors.js';
