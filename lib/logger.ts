import { inspect } from 'util';
import { createLogger, format, transports } from 'winston';

function simpleInspect(value: unknown): string {
  if (typeof value === 'string') return value;
  return inspect(value, { depth: null });
}

// winston keeps the extra log() arguments under the splat symbol
const SPLAT = Symbol.for('splat');

function formatter(info: { level: string; message: unknown; timestamp?: unknown }): string {
  const splat: unknown = Reflect.get(info, SPLAT);
  const rest = Array.isArray(splat) && splat.length > 0
    ? ` ${splat.map(simpleInspect).join(' ')}`
    : '';
  return `${String(info.timestamp)} ${info.level}: ${simpleInspect(info.message)}${rest}`;
}

export const logger = createLogger({
  transports: [new transports.Console()],
  level: process.env.NODE_ENV === 'development' ? 'debug' : 'info',
  format: format.combine(
    format.colorize(),
    format.timestamp(),
    format.printf(formatter),
  ),
});
