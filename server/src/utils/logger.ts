/**
 * Logger Utility
 * Category-tagged log lines with optional turn IDs, mirrored to a daily file
 * under logs/ and streamed to in-process listeners (the companion app feed).
 */

import * as fs from 'fs';
import * as path from 'path';
import { ENV, PROJECT_ROOT } from '../config/env.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
  ts: number;
  turnId?: string;
}

type LogListener = (entry: LogEntry) => void;

const MAX_STRING = 500;
const MAX_ITEMS = 10;
const MAX_DEPTH = 4;

// ============== File sink ==============

let logFile: string | null = ENV.LOG_TO_FILE ? openLogFile() : null;

function openLogFile(): string | null {
  const dir = path.resolve(PROJECT_ROOT, 'logs');
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (e) {
    console.error('Cannot create log directory, logging to console only:', e);
    return null;
  }
  return path.join(dir, `glasses-${new Date().toISOString().slice(0, 10)}.log`);
}

function appendLine(line: string): void {
  if (logFile === null) return;
  try {
    fs.appendFileSync(logFile, line + '\n');
  } catch (e) {
    logFile = null;
    console.error('Log file write failed, logging to console only:', e);
  }
}

// ============== Listeners ==============

const listeners = new Set<LogListener>();

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

function notify(entry: LogEntry): void {
  for (const listener of listeners) {
    try {
      listener(entry);
    } catch (e) {
      console.error('Log listener threw:', e);
    }
  }
}

// ============== Formatting ==============

/**
 * Shrink a payload to something worth printing: audio buffers become a
 * byte count, errors keep name and message, long strings and arrays are cut.
 */
export function summarize(data: unknown, depth = 0): unknown {
  if (data === null || data === undefined) return data;
  if (data instanceof Error) return { name: data.name, message: data.message };
  if (ArrayBuffer.isView(data)) return `[pcm ${data.byteLength} bytes]`;
  if (typeof data === 'string') {
    return data.length > MAX_STRING ? `${data.slice(0, MAX_STRING)}...` : data;
  }
  if (typeof data !== 'object') return data;
  if (depth >= MAX_DEPTH) return '[...]';

  if (Array.isArray(data)) {
    return data.slice(0, MAX_ITEMS).map((item) => summarize(item, depth + 1));
  }
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, summarize(value, depth + 1)])
  );
}

export function formatLine(entry: LogEntry): string {
  const time = new Date(entry.ts).toISOString().slice(11, 23);
  const turn = entry.turnId ? ` (${entry.turnId})` : '';
  return `[${time}] [${entry.level}] [${entry.category}]${turn} ${entry.message}`;
}

// ============== Emit ==============

function write(entry: LogEntry): void {
  const data = summarize(entry.data);
  const line = formatLine(entry);
  const print = entry.level === 'ERROR' ? console.error : entry.level === 'WARN' ? console.warn : console.log;

  if (data === undefined) {
    print(line);
    appendLine(line);
  } else {
    print(line, data);
    appendLine(`${line} ${JSON.stringify(data)}`);
  }

  notify({ ...entry, data });
}

function at(level: LogLevel) {
  return (category: string, message: string, data?: unknown, turnId?: string): void => {
    if (level === 'DEBUG' && !ENV.DEBUG) return;
    write({ level, category, message, data, ts: Date.now(), turnId });
  };
}

export const debug = at('DEBUG');
export const info = at('INFO');
export const warn = at('WARN');
export const error = at('ERROR');

export const logger = { debug, info, warn, error, addLogListener };
