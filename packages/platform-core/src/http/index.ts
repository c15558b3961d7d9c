export * from './response-helpers.js';
