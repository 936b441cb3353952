import pino from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

/**
 * @notice Process-wide logger
 * @dev Writes to stderr so command output on stdout stays clean
 */
export const logger =
  process.env.NODE_ENV === 'dev'
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: { destination: 2 },
        },
      })
    : pino({ level }, pino.destination(2));
