export { createListCommand } from './list.js';
export { createRunCommand } from './run.js';
