// ============================================================================
// @structpack/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for structpack. `info` and `error` only act as thresholds.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Levels that entries are emitted at. */
export type EntryLevel = 'debug' | 'warn';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: EntryLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by the STRUCTPACK_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debug = process.env.STRUCTPACK_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else if (debug === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

/**
 * Create a log entry and emit to console and callbacks.
 */
function log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const prefix = '[structpack]';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `${prefix} ${message}${dataStr}`;

  if (level === 'warn') {
    console.warn(msg);
  } else {
    console.debug(msg);
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[structpack] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when STRUCTPACK_DEBUG=1 is set.
 */
function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;

  constructor() {
    this.startTime = performance.now();
  }

  /** Milliseconds since the timer started. */
  elapsed(): number {
    return performance.now() - this.startTime;
  }
}

export function timer(): Timer {
  return new Timer();
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a completed encode.
 */
export function logEncode(rootKind: string, byteLength: number, durationMs: number): void {
  debug(`encode: ${durationMs.toFixed(2)}ms for ${rootKind} (${byteLength} bytes)`, {
    root: rootKind,
    bytes: byteLength,
    durationMs,
  });
}

/**
 * Log an encode that failed before producing bytes.
 */
export function logEncodeFailure(path: string, message: string): void {
  debug(`encode failed at ${path}`, { path, message });
}

/**
 * Log a node that returned normally after application code caught the error
 * of one of its nested encodes.
 */
export function logCaughtFailure(path: string): void {
  warn(`encode returned after a caught failure at ${path}`, { path });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
