export type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<Level | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
}

function isLevelName(value: string): value is Level | 'silent' {
  return Object.hasOwn(LEVEL_RANK, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelName(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info;
}

export function createLogger(service: string): Logger {
  const log = (level: Level, msg: string, meta?: object) => {
    // LOG_LEVEL is read on every call
    if (LEVEL_RANK[level] < threshold()) return;
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        service,
        message: msg,
        ...meta,
      })
    );
  };
  return {
    debug: (msg: string, meta?: object) => log('debug', msg, meta),
    info: (msg: string, meta?: object) => log('info', msg, meta),
    warn: (msg: string, meta?: object) => log('warn', msg, meta),
    error: (msg: string, meta?: object) => log('error', msg, meta),
  };
}
