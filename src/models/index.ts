export * from './taxonomy-types.js';
export * from './record-types.js';
export * from './validation-types.js';
