import { Command } from 'commander';
import type { TrackerDb } from '@duetrack/core';
import { addTask, GLOBAL_SCOPE, TASK_TYPES } from '@duetrack/core';
import * as out from '../output.js';
import { toForm, withErrorHandling } from '../helpers.js';
import type { TaskOptions } from '../helpers.js';

export function createAddCommand(db: TrackerDb): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .requiredOption('-s, --subject <subject>', 'Course or topic')
    .requiredOption('-d, --due <date>', 'Due date (YYYY-MM-DD)')
    .option('-t, --type <type>', `Task type (${TASK_TYPES.join(', ')})`)
    .option('-p, --priority <priority>', 'required or optional')
    .option('--description <text>', 'Notes or a link')
    .action(withErrorHandling((title: string, opts: TaskOptions) => {
      out.printResult(addTask(db, toForm(title, opts), GLOBAL_SCOPE));
    }));
}
