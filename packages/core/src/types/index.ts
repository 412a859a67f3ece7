export { Priority, PriorityName, DEFAULT_PRIORITY, isPriority } from './priority.js';
export { TASK_TYPES, DEFAULT_TASK_TYPE } from './task-type.js';
export type { KnownTaskType } from './task-type.js';
export type { TaskId, UserId, Task, TaskInput, User } from './task.js';
export type { TaskResult, RegisterResult, ValidationIssue } from './results.js';
export { isSuccess, isError, describeResult } from './results.js';
export { OWNERSHIP_POLICIES, GLOBAL_SCOPE, ownerScope, scopeFor } from './scope.js';
export type { OwnershipPolicy, TaskScope } from './scope.js';
