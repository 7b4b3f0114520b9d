import type { LogLevel } from '@nestjs/common';

const SEVERITY: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** `warn` enables fatal, error and warn. Unknown names fall back to `log`. */
export function logLevelsFrom(level: string): LogLevel[] {
  const index = SEVERITY.findIndex((candidate) => candidate === level);
  const cutoff = index === -1 ? SEVERITY.indexOf('log') : index;
  return SEVERITY.slice(0, cutoff + 1);
}
