// core/models/errors.ts

export class MalformedSourceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly row?: number
  ) {
    super(row === undefined ? `${filePath}: ${message}` : `${filePath} (row ${row}): ${message}`);
    this.name = 'MalformedSourceError';
  }
}

export class MissingRuleTableError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(`${filePath}: ${message}`);
    this.name = 'MissingRuleTableError';
  }
}
