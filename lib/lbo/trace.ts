// lib/lbo/trace.ts
// Injectable trace sink for the LBO engine

import { getLboConfig } from '@/lib/config';

export type TraceScope = 'Projection' | 'Returns' | 'IRR' | 'Model';

export type TraceValue = string | number | boolean | null;

export interface TraceEvent {
  scope: TraceScope;
  message: string;
  data?: Record<string, TraceValue>;
}

export interface TraceSink {
  trace(event: TraceEvent): void;
}

export const silentTraceSink: TraceSink = {
  trace: () => {},
};

/**
 * Writes `[LBO/<Scope>] message key=value ...` lines to stdout.
 */
export const consoleTraceSink: TraceSink = {
  trace: ({ scope, message, data }) => {
    const details = data
      ? Object.entries(data)
          .map(([key, value]) => `${key}=${value}`)
          .join(' ')
      : '';
    console.log(`[LBO/${scope}] ${message}${details ? ` ${details}` : ''}`);
  },
};

/**
 * Collects events in memory (tests, debugging panels).
 */
export function createMemoryTraceSink(): TraceSink & { events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return {
    events,
    trace: (event) => {
      events.push(event);
    },
  };
}

export function defaultTraceSink(): TraceSink {
  return getLboConfig().trace ? consoleTraceSink : silentTraceSink;
}
