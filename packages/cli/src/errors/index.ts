/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  ProtocolError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError } from './handler.js';
