export { tasks } from './tasks.js';
