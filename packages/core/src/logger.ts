import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(
  name: string = 'sylvan',
  level: string = process.env.SYLVAN_LOG_LEVEL ?? 'silent',
): Logger {
  return pino({ name, level });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
