import type { Task } from '../types/task.js';
import { classifyTasks, daysUntilDue, isOverdue, isSoon } from './classifier.js';
import type { Bucket, Buckets } from './classifier.js';
import { filterTasks, parseRange, distinctSubjects } from './list-filter.js';
import type { ListFilter } from './list-filter.js';

export interface TaskView extends Task {
  readonly overdue: boolean;
  readonly soon: boolean;
  readonly daysLeft: number;
}

export interface Dashboard {
  readonly today: string;
  readonly filters: {
    readonly subject: string;
    readonly range: Bucket | null;
    readonly showDone: boolean;
  };
  /** The filtered, sorted list */
  readonly tasks: TaskView[];
  /** Every outstanding task in scope, bucketed; list filters do not apply */
  readonly overview: Buckets<TaskView>;
  readonly counts: Record<Bucket, number>;
  readonly subjects: string[];
}

export function toTaskView(task: Task, today: string): TaskView {
  return {
    ...task,
    overdue: isOverdue(task, today),
    soon: isSoon(task, today),
    daysLeft: daysUntilDue(task, today),
  };
}

/** Everything the list page shows for one request */
export function buildDashboard(tasks: readonly Task[], filter: ListFilter, today: string): Dashboard {
  const views = tasks.map(t => toTaskView(t, today));
  const overview = classifyTasks(views, today);

  return {
    today,
    filters: {
      subject: filter.subject ?? '',
      range: parseRange(filter.range),
      showDone: filter.showDone ?? false,
    },
    tasks: filterTasks(views, filter, today),
    overview,
    counts: {
      overdue: overview.overdue.length,
      today: overview.today.length,
      week: overview.week.length,
      two_weeks: overview.two_weeks.length,
      later: overview.later.length,
    },
    subjects: distinctSubjects(tasks),
  };
}
