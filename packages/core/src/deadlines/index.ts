/**
 * Deadline classification, list filtering and the dashboard view.
 */

export {
  BUCKETS,
  daysUntilDue,
  bucketForDelta,
  bucketFor,
  emptyBuckets,
  classifyTasks,
  isOverdue,
  isSoon,
} from './classifier.js';
export type { Bucket, Buckets, DatedTask } from './classifier.js';

export { parseRange, matchesRange, filterTasks, distinctSubjects } from './list-filter.js';
export type { ListFilter, FilterableTask } from './list-filter.js';

export { buildDashboard, toTaskView } from './dashboard.js';
export type { Dashboard, TaskView } from './dashboard.js';
