// Raised by a connection strategy when its credential source is unusable
export class ConfigLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

// Every connection strategy failed
export class ClusterConnectionError extends Error {
  readonly attempts: readonly string[];

  constructor(attempts: readonly string[]) {
    super(`Could not connect to the Kubernetes cluster (${attempts.join('; ')})`);
    this.name = 'ClusterConnectionError';
    this.attempts = attempts;
  }
}

export class SessionStateError extends Error {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while the session is ${state}`);
    this.name = 'SessionStateError';
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
