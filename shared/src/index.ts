export * from './thoughts.js';
