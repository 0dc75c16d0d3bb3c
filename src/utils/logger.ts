import pino from 'pino';

type LogLevel = pino.LevelWithSilent;

const levels: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function normalizeLogLevel(raw: string | undefined): LogLevel | undefined {
  const level = raw?.trim().toLowerCase();
  return levels.find((l) => l === level);
}

export const logger = pino({
  name: 'reactor-timers',
  level: normalizeLogLevel(process.env.LOG_LEVEL) ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
});
