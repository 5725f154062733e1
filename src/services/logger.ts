// Structured logging for the pipeline service
import { Logger, type ILogObj } from 'tslog';

const LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

function minLevelFromEnv(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const idx = LEVELS.findIndex((l) => l === raw);
  return idx === -1 ? 3 : idx;
}

function logType(): 'pretty' | 'json' | 'hidden' {
  if (process.env.NODE_ENV === 'test') return 'hidden';
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty';
}

export const logger = new Logger<ILogObj>({
  name: 'answer-pipeline',
  minLevel: minLevelFromEnv(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: logType(),
});
