import pino from 'pino';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// ログエントリの型定義
export interface LogEntry {
  level: number;
  levelLabel: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

// ログレベル番号からラベルへの変換
function levelToLabel(level: number): LogLevel {
  if (level <= 20) return 'debug';
  if (level <= 30) return 'info';
  if (level <= 40) return 'warn';
  return 'error';
}

let loggerInstance: pino.Logger | null = null;

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  if (loggerInstance) {
    return loggerInstance;
  }

  const { level = 'info', pretty = true } = options;

  loggerInstance = pretty
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino({ level });

  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    return createLogger();
  }
  return loggerInstance;
}

const logLineSchema = z
  .object({
    level: z.number(),
    time: z.number(),
    msg: z.string().default(''),
  })
  .passthrough();

export interface MemoryLogger {
  logger: pino.Logger;
  entries: LogEntry[];
}

// 出力をメモリ上のバッファに溜めるロガー（エンジンに渡して出力を検査する用途）
export function createMemoryLogger(level: LogLevel = 'debug'): MemoryLogger {
  const entries: LogEntry[] = [];

  const logger = pino(
    { level, base: undefined },
    {
      write(line: string) {
        const parsed = logLineSchema.safeParse(JSON.parse(line));
        if (!parsed.success) {
          return;
        }
        entries.push({ ...parsed.data, levelLabel: levelToLabel(parsed.data.level) });
      },
    }
  );

  return { logger, entries };
}

export type Logger = pino.Logger;
