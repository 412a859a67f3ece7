export { tasks } from './tasks.js';
export { users } from './users.js';
