export { DispatchClient, type DispatchClientOptions } from './DispatchClient.js';
export {
  DispatchClientError,
  DispatchCommandError,
  DispatchConnectionError,
  DispatchEarlyCloseError,
  DispatchParseError,
  DispatchTimeoutError,
  DispatchTransportError,
  isConnectionError,
} from './errors.js';
