export type { DocumentValidator, ValidationOutcome } from './types';
export { ExternalAjvValidator, DEFAULT_AJV_BIN } from './external-ajv-validator';
export { InProcessAjvValidator } from './in-process-ajv-validator';
