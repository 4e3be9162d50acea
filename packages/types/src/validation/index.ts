export {
  validateOutput,
  validateAndThrow,
  formatValidationErrors,
  type ValidationResult,
  type ValidationError,
} from './ajv-validator.js';
