export { executeAttempt } from './executeAttempt.js';
