// Task queries
export {
  getTaskById,
  getScopedTask,
  getTasks,
  getSubjects,
  getTaskList,
  getDashboard,
  insertTask,
  addTask,
  editTask,
  setDone,
  deleteTask,
} from './task-queries.js';

// User queries
export {
  CredentialsSchema,
  getUserById,
  getUserByUsername,
  registerUser,
  verifyUser,
  verifySharedAccount,
} from './user-queries.js';
export type { Credentials } from './user-queries.js';
