import { PinoLogger } from '@mastra/loggers';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function resolveLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'warn' || value === 'error') return value;
  return 'info';
}

export const logger = new PinoLogger({
  name: 'InboxTriage',
  level: resolveLevel(process.env.LOG_LEVEL),
});
