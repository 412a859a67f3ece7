import { Command } from 'commander';
import type { TrackerDb } from '@duetrack/core';
import { editTask, getTaskById, GLOBAL_SCOPE } from '@duetrack/core';
import * as out from '../output.js';
import { parseIds, toEditForm, withErrorHandling } from '../helpers.js';
import type { TaskOptions } from '../helpers.js';

interface EditOptions extends TaskOptions {
  title?: string;
}

export function createEditCommand(db: TrackerDb): Command {
  return new Command('edit')
    .description('Change a task; fields not given keep their value')
    .argument('<taskId>', 'The id of the task to edit')
    .option('--title <title>', 'New title')
    .option('-s, --subject <subject>', 'Course or topic')
    .option('-d, --due <date>', 'Due date (YYYY-MM-DD)')
    .option('-t, --type <type>', 'Task type')
    .option('-p, --priority <priority>', 'required or optional')
    .option('--description <text>', 'Notes or a link')
    .action(withErrorHandling((taskId: string, opts: EditOptions) => {
      const ids = parseIds([taskId]);
      const id = ids?.[0];
      if (id == null) return;

      const task = getTaskById(db, id);
      if (!task) {
        out.printResult({ type: 'not-found', taskId: id });
        return;
      }
      out.printResult(editTask(db, id, toEditForm(task, opts.title, opts), GLOBAL_SCOPE));
    }));
}
