export type FontCacheStage = 'query' | 'parse' | 'mapping' | 'write';

export class FontCacheError extends Error {
  readonly stage: FontCacheStage;

  constructor(stage: FontCacheStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FontCacheError';
    this.stage = stage;
  }
}

export class ServiceUnavailableError extends FontCacheError {
  readonly command: string;

  constructor(command: string, detail: string, options?: { cause?: unknown }) {
    super('query', `${command} failed: ${detail}`, options);
    this.name = 'ServiceUnavailableError';
    this.command = command;
  }
}

export class MalformedRecordError extends FontCacheError {
  readonly line: number;

  constructor(line: number, detail: string) {
    super('parse', `Malformed record on line ${line}: ${detail}`);
    this.name = 'MalformedRecordError';
    this.line = line;
  }
}

export class UnknownStyleCodeError extends FontCacheError {
  readonly attribute: 'slant' | 'width';
  readonly code: string;

  constructor(attribute: 'slant' | 'width', code: string, file?: string) {
    super('mapping', `Unknown ${attribute} code ${JSON.stringify(code)}${file ? ` for ${file}` : ''}`);
    this.name = 'UnknownStyleCodeError';
    this.attribute = attribute;
    this.code = code;
  }
}
