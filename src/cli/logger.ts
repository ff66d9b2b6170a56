import fs from 'node:fs';
import path from 'node:path';
import pino, { type Logger } from 'pino';
import { ui } from './ui.js';
import { isQuiet, isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

let level = process.env.LOG_LEVEL || 'info';

function createSink(): Logger {
  // No file handles under Jest
  if (isTestEnv()) return pino({ level: 'silent', base: undefined });
  const logsDir = path.resolve(process.env.LOG_DIR || 'logs');
  fs.mkdirSync(logsDir, { recursive: true });
  const stream = pino.destination({ dest: path.join(logsDir, 'blackjack.ndjson'), mkdir: true, sync: false });
  return pino({ level, base: undefined }, stream);
}

const logger = createSink();

function info(msg: string, scope?: string, data?: Data) {
  if (!isQuiet()) ui.say(msg, 'info');
  logger.info({ msg, ts: Date.now(), scope, data });
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  logger.warn({ msg, ts: Date.now(), scope, data });
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  logger.error({ msg, ts: Date.now(), scope, data });
}
function debug(msg: string, scope?: string, data?: Data) {
  if (level === 'debug') ui.say(msg, 'dim');
  logger.debug({ msg, ts: Date.now(), scope, data });
}

/** Applies the validated `LOG_LEVEL` once `.env` has been read; the test sink stays silent. */
function setLevel(next: string) {
  level = next;
  if (!isTestEnv()) logger.level = next;
}

function currentLevel() {
  return level;
}

export type ScopedLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

function withScope(scope: string): ScopedLog {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

export const log = { info, warn, error, debug, withScope, setLevel, currentLevel };
export default log;
