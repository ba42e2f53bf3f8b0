export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string
  ) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class IndexNotFoundError extends Error {
  constructor(public readonly indexPath: string) {
    super('Template index not found. Run `ignorepick update` first.');
    this.name = 'IndexNotFoundError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}
