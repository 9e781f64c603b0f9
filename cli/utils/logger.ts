/**
 * Structured JSON logger for the CLI, one object per line:
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"debug","message":"Profile loaded","component":"cli","taxYear":2025}
 *
 * Lines go to a sink, stderr unless the caller supplies one; stdout
 * carries only the report. LOG_LEVEL=debug adds the debug lines, any
 * other value logs errors only.
 */

export type LogLevel = 'debug' | 'error'

export type LogSink = (line: string) => void

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

export function resolveLevel(raw: string | undefined): LogLevel {
  return raw?.trim().toLowerCase() === 'debug' ? 'debug' : 'error'
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n')
}

export class Logger {
  constructor(
    private readonly level: LogLevel = 'error',
    private readonly sink: LogSink = stderrSink,
    private readonly defaults: Record<string, unknown> = {},
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level === 'debug') this.write('debug', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Same level and sink, with `defaults` added to every line. */
  child(defaults: Record<string, unknown>): Logger {
    return new Logger(this.level, this.sink, { ...this.defaults, ...defaults })
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.defaults,
      ...context,
    }
    this.sink(JSON.stringify(entry))
  }
}
