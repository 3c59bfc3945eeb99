import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Logs to console, plus a JSON file in production when LOG_FILE is set
 */

const SECRET_PATTERNS = [
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /authorization[=:]\s*["']?([^"'\s]+)/gi,
  /bearer\s+([^"'\s]+)/gi,
];

const SECRET_KEYS = ['token', 'authorization', 'secret', 'apiToken', 'webhookUrl'];

function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Date) {
    return obj;
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'timestamp') continue;
    info[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    silent: env.NODE_ENV === 'test',
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Process-wide logger, replaced in server.ts once the environment is validated
 */
export let logger: winston.Logger = winston.createLogger({
  level: 'info',
  transports: [new winston.transports.Console()],
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
