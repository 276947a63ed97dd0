import pino from 'pino';

// Synchronous stderr keeps log lines ordered ahead of process exit and off stdout.
export const logger = pino(
  {
    name: 'fantastical',
    level: process.env['LOG_LEVEL'] ?? 'warn',
  },
  pino.destination({ fd: 2, sync: true })
);

const baseLevel = logger.level;

/** Applied on every command run; never less verbose than `LOG_LEVEL`. */
export function setVerbose(enabled: boolean): void {
  const raise = enabled && logger.levels.values[baseLevel] > logger.levels.values['debug'];
  logger.level = raise ? 'debug' : baseLevel;
}
