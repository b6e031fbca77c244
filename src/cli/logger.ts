import pino from 'pino';
import { getConfig } from '../config/index.js';
import { isTestEnv } from '../util/env.js';
import { normalizeError } from '../util/errors.js';
import { ui } from './ui.js';

type Data = Record<string, unknown>;

let logger: pino.Logger | null = null;

function base(): pino.Logger {
  if (logger) return logger;
  if (isTestEnv()) {
    logger = pino({ level: 'silent' });
    return logger;
  }
  const { logLevel, logFile } = getConfig();
  const stream = pino.destination({ dest: logFile, mkdir: true, sync: false });
  logger = pino({ level: logLevel, base: undefined }, stream);
  return logger;
}

function info(msg: string, scope?: string, data?: Data) {
  base().info({ scope, ...data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  base().warn({ scope, ...data }, msg);
}
function error(msg: string, scope?: string, err?: unknown) {
  ui.say(msg, 'error');
  base().error({ scope, err: err === undefined ? undefined : normalizeError(err) }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
  base().debug({ scope, ...data }, msg);
}

function flush() {
  logger?.flush();
}

function withScope(scope: string) {
  return {
    info: (msg: string, data?: Data) => info(msg, scope, data),
    warn: (msg: string, data?: Data) => warn(msg, scope, data),
    error: (msg: string, err?: unknown) => error(msg, scope, err),
    debug: (msg: string, data?: Data) => debug(msg, scope, data),
  };
}

export type ScopedLog = ReturnType<typeof withScope>;

export const log = { info, warn, error, debug, flush, withScope };
export default log;
