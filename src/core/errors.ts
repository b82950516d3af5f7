/**
 * Custom error types for XBRL processing.
 * Only structural failures are errors; missing data is returned as null / [].
 */

const SNIPPET_LENGTH = 200;

export class XbrlProcessingError extends Error {
  public readonly snippet: string | null;

  constructor(
    message: string,
    public readonly source: string,
    content: string | null = null
  ) {
    super(`Error parsing ${source}: ${message}`);
    this.name = 'XbrlProcessingError';
    this.snippet = content === null ? null : content.trim().slice(0, SNIPPET_LENGTH);
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly key: string) {
    super(`Invalid configuration for ${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class MappingFileError extends Error {
  constructor(message: string, public readonly path: string) {
    super(`Invalid concept mapping file ${path}: ${message}`);
    this.name = 'MappingFileError';
  }
}
