import fs from "node:fs"
import path from "node:path"

import config from "./config.js"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const threshold = LOG_LEVELS[config.LOG_LEVEL]

/** Destination for formatted log lines. */
export interface LogSink {
  write(level: LogLevel, line: string): void
  close?(): void
}

export function formatMessage(level: LogLevel, scope: string, message: string, meta?: unknown): string {
  const line = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`
  return meta === undefined ? line : `${line} ${JSON.stringify(meta, serializeError)}`
}

function serializeError(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }
  return value
}

const consoleSink: LogSink = {
  write(level, line) {
    const target = level === "warn" || level === "error" ? process.stderr : process.stdout
    target.write(`${line}\n`)
  },
}

class FileSink implements LogSink {
  private stream: fs.WriteStream | null

  constructor(file: string) {
    const resolved = path.resolve(process.cwd(), file)
    fs.mkdirSync(path.dirname(resolved), { recursive: true })
    this.stream = fs.createWriteStream(resolved, { flags: "a" })
  }

  write(_level: LogLevel, line: string): void {
    this.stream?.write(`${line}\n`)
  }

  close(): void {
    this.stream?.end()
    this.stream = null
  }
}

function defaultSinks(): LogSink[] {
  if (config.LOG_FILE.length === 0) {
    return [consoleSink]
  }
  try {
    return [consoleSink, new FileSink(config.LOG_FILE)]
  } catch (error) {
    console.error(`[Logger] Failed to open ${config.LOG_FILE}: ${error}`)
    return [consoleSink]
  }
}

const sinks = defaultSinks()

export interface Logger {
  debug(message: string, meta?: unknown): void
  info(message: string, meta?: unknown): void
  warn(message: string, meta?: unknown): void
  error(message: string, meta?: unknown): void
  /** Logger for a sub-scope, written as `parent.name`. */
  child(name: string): Logger
}

export function createLogger(scope: string, targets: readonly LogSink[] = sinks): Logger {
  const emit = (level: LogLevel, message: string, meta?: unknown): void => {
    if (LOG_LEVELS[level] < threshold) {
      return
    }
    const line = formatMessage(level, scope, message, meta)
    for (const sink of targets) {
      sink.write(level, line)
    }
  }

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (name) => createLogger(`${scope}.${name}`, targets),
  }
}

export function closeLogStream(): void {
  for (const sink of sinks) {
    sink.close?.()
  }
}

export default createLogger
