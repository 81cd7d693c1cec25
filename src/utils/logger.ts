/**
 * Logging with Pino - provider credentials are redacted.
 * Logs go to stderr so that JSON command output on stdout stays parseable.
 */

import pino from 'pino';

const redactPaths = [
  'appKey',
  'appkey',
  'appSecret',
  'appsecret',
  'accountNo',
  'apiKey',
  'crtfc_key',
  'authorization',
  'Authorization',
  'secret',
  'token',
  'access_token',
  '*.appKey',
  '*.appSecret',
  '*.accountNo',
  '*.apiKey',
  'credentials.*',
  'headers.authorization',
  'headers.Authorization',
  'headers.appkey',
  'headers.appsecret',
];

const usePretty =
  process.env.NODE_ENV !== 'production' &&
  process.env.NODE_ENV !== 'test' &&
  process.env.LOG_FORMAT !== 'json';

export const logger = usePretty
  ? pino({
      level: process.env.LOG_LEVEL || 'info',
      redact: {
        paths: redactPaths,
        censor: '[REDACTED]',
      },
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(
      {
        level: process.env.LOG_LEVEL || 'info',
        redact: {
          paths: redactPaths,
          censor: '[REDACTED]',
        },
      },
      pino.destination(2)
    );

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
