import type { LogEntry } from '@pzws/shared-types';
import { config } from '../config/app.config';

const maxEntries = config.logStore.maxEntries;

const entries: LogEntry[] = [];

export interface LogQuery {
  level?: LogEntry['level'];
  page?: number;
  pageSize?: number;
}

export function addLogEntry(entry: LogEntry): void {
  entries.push(entry);
  if (entries.length > maxEntries) {
    entries.splice(0, entries.length - maxEntries);
  }
}

export function getLogEntries(query: LogQuery = {}): LogEntry[] {
  const level = query.level;
  const page = Number(query.page) || 1;
  const pageSize = Number(query.pageSize) || 50;

  const filtered = level ? entries.filter((entry) => entry.level === level) : entries;
  const ordered = [...filtered].reverse();
  const start = (page - 1) * pageSize;
  return ordered.slice(start, start + pageSize);
}
