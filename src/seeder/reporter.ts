import type { ReportLevel, ReportingSink } from '../types/csv';

export interface ReportedMessage {
  message: string;
  level: ReportLevel;
}

/**
 * Reporting sink writing tagged lines to the console.
 */
export function createConsoleReporter(tag: string = '[CsvSeeder]'): ReportingSink {
  return {
    emit(message: string, level: ReportLevel = 'info'): void {
      const line = `${tag} ${message}`;

      if (level === 'error') {
        console.error(line);
      } else if (level === 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    },
  };
}

/**
 * Reporting sink keeping every message in memory (used for job results).
 */
export function createMemoryReporter(): ReportingSink & { messages: ReportedMessage[] } {
  const messages: ReportedMessage[] = [];

  return {
    messages,
    emit(message: string, level: ReportLevel = 'info'): void {
      messages.push({ message, level });
    },
  };
}

/**
 * Forward every message to each of the given sinks.
 */
export function teeReporter(...sinks: ReportingSink[]): ReportingSink {
  return {
    emit(message: string, level?: ReportLevel): void {
      for (const sink of sinks) {
        sink.emit(message, level);
      }
    },
  };
}
