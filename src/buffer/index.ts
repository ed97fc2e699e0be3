export { LogBuffer } from './LogBuffer.js';
