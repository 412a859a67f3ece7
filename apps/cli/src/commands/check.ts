import { Command } from 'commander';
import type { TrackerDb } from '@duetrack/core';
import { setDone, deleteTask, GLOBAL_SCOPE } from '@duetrack/core';
import * as out from '../output.js';
import { parseIds, withErrorHandling } from '../helpers.js';

export function createDoneCommand(db: TrackerDb): Command {
  return new Command('done')
    .description('Mark one or more tasks done')
    .argument('<taskIds...>', 'The id(s) of the task(s) to mark done')
    .action(withErrorHandling((taskIds: string[]) => {
      for (const id of parseIds(taskIds) ?? []) out.printResult(setDone(db, id, true, GLOBAL_SCOPE));
    }));
}

export function createUndoCommand(db: TrackerDb): Command {
  return new Command('undo')
    .description('Mark one or more tasks not done')
    .argument('<taskIds...>', 'The id(s) of the task(s) to reopen')
    .action(withErrorHandling((taskIds: string[]) => {
      for (const id of parseIds(taskIds) ?? []) out.printResult(setDone(db, id, false, GLOBAL_SCOPE));
    }));
}

export function createDeleteCommand(db: TrackerDb): Command {
  return new Command('delete')
    .description('Delete one or more tasks permanently')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action(withErrorHandling((taskIds: string[]) => {
      for (const id of parseIds(taskIds) ?? []) out.printResult(deleteTask(db, id, GLOBAL_SCOPE));
    }));
}
