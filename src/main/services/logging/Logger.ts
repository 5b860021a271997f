import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

interface LoggerOptions {
  fileName?: string;
  mirrorFilePath?: string | null;
  minLevel?: LogLevel;
  maxBytes?: number;
}

// campo invalido cai no valor padrao; a linha continua legivel
const logLineSchema = z.object({
  ts: z.string().optional().catch(undefined),
  level: z.enum(['debug', 'info', 'warn', 'error']).optional().catch(undefined),
  message: z.string().optional().catch(undefined),
  meta: z.unknown()
});

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxBytes: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, options?.fileName ?? 'update-policy.log');
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.minLevel = options?.minLevel ?? 'debug';
    this.maxBytes = options?.maxBytes ?? 2 * 1024 * 1024;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  entries(limit?: number): LogEntry[] {
    const entries: LogEntry[] = [];

    for (const file of [`${this.filePath}.1`, this.filePath]) {
      if (!fs.existsSync(file)) {
        continue;
      }

      for (const raw of fs.readFileSync(file, 'utf-8').split('\n')) {
        const line = raw.trim();
        if (line) {
          entries.push(parseLogLine(line));
        }
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // espelho e opcional; falha aqui nao interrompe o log principal
      }
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath) || fs.statSync(this.filePath).size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    fs.rmSync(rotated, { force: true });
    fs.renameSync(this.filePath, rotated);
  }
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed = logLineSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      return { ts: new Date().toISOString(), level: 'info', message: line };
    }

    return {
      ts: parsed.data.ts ?? new Date().toISOString(),
      level: parsed.data.level ?? 'info',
      message: parsed.data.message ?? line,
      meta: parsed.data.meta
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
