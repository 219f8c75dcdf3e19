import { ENABLE_LOGGING } from './config';

const MAX_HISTORY = 500;

type LogListener = (line: string) => void;

export class DebugLogger {
  private history: string[] = [];
  private listeners: LogListener[] = [];

  constructor(private enabled: boolean = ENABLE_LOGGING) {}

  get logs(): readonly string[] {
    return this.history;
  }

  log(message: string): void {
    if (this.enabled) console.log(message);
    this.record(message);
  }

  error(message: string): void {
    console.error(message);
    this.record(message);
  }

  addListener(listener: LogListener): void {
    this.listeners.push(listener);
  }

  removeListener(listener: LogListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  clear(): void {
    this.history = [];
  }

  private record(message: string): void {
    const line = `${new Date().toISOString()}: ${message}`;
    this.history.push(line);
    if (this.history.length > MAX_HISTORY) this.history.shift();
    for (const listener of this.listeners) listener(line);
  }
}

export const logger = new DebugLogger();
