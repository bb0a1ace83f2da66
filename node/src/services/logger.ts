// node/src/services/logger.ts: structured logging for the coordinator and workers
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveType(value: string | undefined): 'pretty' | 'json' | 'hidden' {
  if (value === 'json' || value === 'hidden') return value;
  return 'pretty';
}

export const logger: Logger<ILogObj> = new Logger({
  name: 'estate-search',
  minLevel: LEVELS[process.env.LOG_LEVEL ?? 'info'] ?? LEVELS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: resolveType(process.env.LOG_FORMAT),
});

export function componentLogger(name: string): Logger<ILogObj> {
  return logger.getSubLogger({ name });
}
