export {
  validateGeneratedFile,
  validateGeneratedSource,
  type PostValidationOptions,
  type PostValidationResult,
} from './validator.js';
