/**
 * Result of validating a written document against a schema.
 *
 * Validation is report-only: neither outcome other than `passed` is an error,
 * and the generated file is never touched.
 */
export type ValidationOutcome =
  | { status: 'passed' }
  | { status: 'failed'; details: string }
  | { status: 'unavailable'; reason: string };

export interface DocumentValidator {
  /** Short label used in CLI messages. */
  readonly name: string;
  validate(dataPath: string, schemaPath: string): Promise<ValidationOutcome>;
}
