/**
 * Reconciliation Error Types
 *
 * Raised for misconfiguration only. Data problems never throw out of
 * `reconcile()`; they show up as notes and diagnostics instead.
 */

export type ReconciliationErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_FIELD_TYPE'
  | 'REPORT_FAILED';

export interface ReconciliationErrorDetails {
  code: ReconciliationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconciliationErrorDetails) {
    super(details.message);
    this.name = 'ReconciliationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
