export type ErrorSeverity = 'transient' | 'permanent';

/**
 * Invalid or inconsistent configuration, fatal at startup.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/**
 * Base class of errors raised while reconciling a record. Transient errors
 * are expected to go away by themselves, permanent ones need an operator.
 * Neither is retried within a pass.
 */
export class DDNSError extends Error {
  override readonly name: string = 'DDNSError';

  constructor(
    message: string,
    readonly severity: ErrorSeverity,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Every IP source failed for the requested family.
 */
export class ResolutionError extends DDNSError {
  override readonly name = 'ResolutionError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, 'transient', options);
  }
}

/**
 * The record to update does not exist. Records are never created.
 */
export class RecordAbsentError extends DDNSError {
  override readonly name = 'RecordAbsentError';

  constructor(
    readonly domain: string,
    readonly type: string,
  ) {
    super(`No ${type} record found for ${domain}.`, 'permanent');
  }
}

export class ProviderError extends DDNSError {
  override readonly name: string = 'ProviderError';
}

/**
 * The server response carries no TSIG record or one that does not verify
 * under the configured key.
 */
export class TSIGVerificationError extends ProviderError {
  override readonly name = 'TSIGVerificationError';

  constructor(message: string) {
    super(message, 'permanent');
  }
}
