import { logger } from './logger.js';

export class ModgraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: string
  ) {
    super(message);
    this.name = 'ModgraphError';
  }
}

export class ScanError extends ModgraphError {
  constructor(message: string, details?: string) {
    super(message, 'SCAN_ERROR', details);
    this.name = 'ScanError';
  }
}

export class ConfigError extends ModgraphError {
  constructor(message: string, details?: string) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ParseError extends ModgraphError {
  constructor(message: string, details?: string) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class DecodeError extends ModgraphError {
  constructor(filePath: string) {
    super(
      `File is not valid UTF-8 text: ${filePath}`,
      'DECODE_ERROR',
      'Only UTF-8 encoded source files can be analyzed.'
    );
    this.name = 'DecodeError';
  }
}

export class FileNotFoundError extends ModgraphError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      `The file at ${filePath} does not exist. Please check the path and try again.`
    );
    this.name = 'FileNotFoundError';
  }
}

export class RenderError extends ModgraphError {
  constructor(message: string, details?: string) {
    super(message, 'RENDER_ERROR', details);
    this.name = 'RenderError';
  }
}

export class RendererUnavailableError extends ModgraphError {
  constructor(executable: string, details?: string) {
    super(
      `${executable} is not installed or not available in PATH`,
      'RENDERER_UNAVAILABLE',
      details
    );
    this.name = 'RendererUnavailableError';
  }
}

export function handleError(error: unknown): never {
  logger.stopSpinner();

  if (error instanceof ModgraphError) {
    logger.error(error.message);
    if (error.details) {
      console.error(`\n${error.details}\n`);
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  logger.error('An unknown error occurred');
  console.error(error);
  process.exit(1);
}
