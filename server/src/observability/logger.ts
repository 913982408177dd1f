type LogLevel = 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 10,
  warn: 20,
  error: 30,
  silent: 100
};

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  if (raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

const threshold = thresholdFromEnv();

// Une ligne JSON par événement, lisible par n'importe quel collecteur de logs.
function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (LEVEL_RANK[level] < threshold) {
    return;
  }

  const line = JSON.stringify({
    level,
    event,
    time: new Date().toISOString(),
    ...fields
  });

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write('error', event, fields);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
