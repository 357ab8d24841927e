import pino from 'pino';

const pretty = process.env['NODE_ENV'] !== 'production';

// stdout carries the run summary; logs go to stderr (fd 2).
export const logger = pino(
  {
    level: process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined,
    redact: {
      paths: [
        'client_secret',
        'access_token',
        'authorization',
        '*.client_secret',
        '*.access_token',
        '*.authorization',
      ],
      censor: '***REDACTED***',
    },
  },
  pretty ? undefined : pino.destination(2),
);

export type Logger = pino.Logger;
