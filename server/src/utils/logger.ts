export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// Le niveau est relu à chaque appel pour suivre LOG_LEVEL
function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

// Fonction de logging personnalisée
export function debugLog(...args: unknown[]): void {
  if (!enabled('debug')) return;
  console.log(new Date().toISOString(), '-', ...args);
}

export function infoLog(...args: unknown[]): void {
  if (!enabled('info')) return;
  console.info(new Date().toISOString(), '-', ...args);
}

export function warnLog(...args: unknown[]): void {
  if (!enabled('warn')) return;
  console.warn(new Date().toISOString(), '- WARN:', ...args);
}

export function errorLog(...args: unknown[]): void {
  if (!enabled('error')) return;
  console.error(new Date().toISOString(), '- ERROR:', ...args);
}
