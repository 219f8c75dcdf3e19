// No candidate validated. Terminal for the run, never retried.
export class DiscoveryError extends Error {
  constructor(engineName: string, detail?: string) {
    super(`${engineName} discovery failed${detail ? `: ${detail}` : '.'}`);
    this.name = 'DiscoveryError';
  }
}

// Socket or connection failure inside a phase worker.
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

// Unexpected status code or broken header framing. The connection is dropped.
export class ProtocolError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
