export { createValidateBody, createValidateParams, createValidation } from './validation.js';
export type { ValidationMiddleware } from './validation.js';
