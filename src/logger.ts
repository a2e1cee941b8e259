import pino, { type LoggerOptions } from 'pino';

import { config } from './config.js';

const opts: LoggerOptions = { level: config.logLevel };
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
if (pretty) {
  // stdout is reserved for the report.
  opts.transport = {
    target: 'pino-pretty',
    options: { colorize: true, translateTime: 'SYS:standard', destination: 2 },
  };
}

export const logger = pretty ? pino(opts) : pino(opts, pino.destination(2));
