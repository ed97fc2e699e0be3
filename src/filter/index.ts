export { shouldInclude, normalizeIgnorePatterns } from './lineFilter.js';
