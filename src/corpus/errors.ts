/**
 * Corpus directory validation errors
 */

export class DirectoryNotFoundError extends Error {
  constructor(readonly directory: string) {
    super(`Directory not found: ${directory}`);
    this.name = 'DirectoryNotFoundError';
  }
}

export class NotADirectoryError extends Error {
  constructor(readonly directory: string) {
    super(`Not a directory: ${directory}`);
    this.name = 'NotADirectoryError';
  }
}

export class EmptyDirectoryError extends Error {
  constructor(readonly directory: string) {
    super(`No raw article files in: ${directory}`);
    this.name = 'EmptyDirectoryError';
  }
}

export class InconsistentDatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InconsistentDatasetError';
  }
}
