/**
 * Engine error types. Lanes branch on these to decide between skipping an
 * event, halting the symbol, or escalating a broker failure.
 */

export class DataIntegrityError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'DataIntegrityError';
    this.field = field;
  }
}

/** Classifier/tracker invariant broken. Fatal for the owning lane only. */
export class StructureCorruptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StructureCorruptionError';
  }
}

export type BrokerErrorCode = 'rejected' | 'connectivity' | 'not_found' | 'timeout';

export class BrokerError extends Error {
  readonly code: BrokerErrorCode;

  constructor(code: BrokerErrorCode, message: string) {
    super(message);
    this.name = 'BrokerError';
    this.code = code;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
