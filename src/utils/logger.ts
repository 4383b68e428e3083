import pino from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const isProduction = nodeEnv === 'production';
const logLevel = process.env['LOG_LEVEL'] ?? (isProduction ? 'info' : 'debug');

// stdout carries rendered search output, so logs always go to stderr.
export const logger =
  isProduction || nodeEnv === 'test'
    ? pino({ level: logLevel }, pino.destination(2))
    : pino({
        level: logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });

export function createChildLogger(name: string) {
  return logger.child({ component: name });
}
