/**
 * HTTP Module - Index
 */

export * from './types.js';
export * from './http-client.js';
export * from './response-validation.js';
