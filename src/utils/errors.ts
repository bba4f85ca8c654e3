export class MalformedDocumentError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = 'MalformedDocumentError';
    this.line = line;
  }
}

export class UnsupportedEncodingError extends Error {
  constructor(encoding: string, message?: string) {
    super(message ? `Unsupported encoding ${encoding}: ${message}` : `Unsupported encoding: ${encoding}`);
    this.name = 'UnsupportedEncodingError';
  }
}

export class ConfigError extends Error {
  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class NoOperationError extends Error {
  constructor(message = 'At least one operation must be specified') {
    super(message);
    this.name = 'NoOperationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
