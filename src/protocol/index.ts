/**
 * Dispatch protocol: wire types, error taxonomy, framing and codecs.
 */

export * from './types.js';
export * from './errors.js';
export { JsonFrameDecoder } from './framing.js';
export {
  decodeCommand,
  encodeRequest,
  encodeResponse,
  errorResponse,
  isRecord,
  readResponse,
  toResponse,
} from './guards.js';
