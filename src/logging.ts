import pino, { type Logger } from 'pino';
import { z } from 'zod';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * LOG_LEVEL when set; otherwise `silent` under Vitest (so socket tests stay quiet) and `info`.
 * @throws ZodError for a level pino does not know
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env['LOG_LEVEL']?.trim().toLowerCase();
  if (raw) return LogLevelSchema.parse(raw);
  return env['VITEST'] ? 'silent' : 'info';
}

// stderr: stdout belongs to whatever embeds the package
const destination = pino.destination({ dest: 2, sync: false });

export const logger: Logger = pino(
  {
    level: resolveLogLevel(),
    base: { app: 'oscwire' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
  },
  destination,
);

/** Child logger tagged with the component name (`osc-server`, `osc-dispatch`, ...). */
export function scoped(scope: string): Logger {
  return logger.child({ scope });
}
