export * from './company.js';
export * from './change.js';
