import pino, { type Bindings, type Logger } from 'pino';

import { getConfig } from '../../config/env.js';

let root: Logger | undefined;

/**
 * Built on first use so a bad environment surfaces where the caller can
 * report it, not while modules load.
 */
export function getLogger(): Logger {
  // stdout is reserved for CLI output
  root ??= pino(
    {
      name: 'meme-animator',
      level: getConfig().logLevel,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        error: pino.stdSerializers.err,
      },
    },
    pino.destination({ fd: 2, sync: true }),
  );
  return root;
}

export function createChildLogger(bindings: Bindings): Logger {
  return getLogger().child(bindings);
}
