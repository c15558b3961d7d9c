/**
 * Platform Core - Shared Utilities for tracklane services
 *
 * - Structured logging with correlation tracking
 * - Error handling patterns
 * - Configuration utilities
 * - Request validation and response helpers
 * - Database connection management
 */

export * from './config/index.js';
export * from './database/index.js';
export * from './error-handling/index.js';
export * from './http/index.js';
export * from './logging/index.js';
export * from './middleware/index.js';
