export * from './parseError.js';
