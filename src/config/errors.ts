/**
 * Configuration errors. Each one aborts the run before any network I/O.
 */

export type ConfigErrorKind =
  | 'config_file'
  | 'seed_urls'
  | 'headers'
  | 'number_of_articles_type'
  | 'number_of_articles_range'
  | 'encoding'
  | 'timeout'
  | 'verify';

export abstract class ConfigError extends Error {
  abstract readonly kind: ConfigErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigFileError extends ConfigError {
  readonly kind = 'config_file';
}

export class SeedUrlError extends ConfigError {
  readonly kind = 'seed_urls';
}

export class HeaderError extends ConfigError {
  readonly kind = 'headers';
}

/** Base for both article-count failures so callers can catch either. */
export abstract class NumberOfArticlesError extends ConfigError {}

/** Not an integer, or below 1: a bug in whatever produced the config. */
export class IncorrectNumberOfArticlesError extends NumberOfArticlesError {
  readonly kind = 'number_of_articles_type';
}

/** A well-formed count above the crawl policy limit. */
export class NumberOfArticlesOutOfRangeError extends NumberOfArticlesError {
  readonly kind = 'number_of_articles_range';
}

export class EncodingError extends ConfigError {
  readonly kind = 'encoding';
}

export class TimeoutError extends ConfigError {
  readonly kind = 'timeout';
}

/** Raised for both the certificate and the headless flags. */
export class VerifyError extends ConfigError {
  readonly kind = 'verify';
}
