import { Command } from 'commander';
import type { TrackerDb } from '@duetrack/core';

import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createDoneCommand, createUndoCommand, createDeleteCommand } from './commands/check.js';
import { createListCommand, createDashboardCommand, createSubjectsCommand } from './commands/list.js';

/** Build the CLI program over an open database */
export function createProgram(db: TrackerDb): Command {
  const program = new Command()
    .name('duetrack')
    .description('Track study tasks and deadlines')
    .version('1.0.0');

  // Register commands
  program.addCommand(createAddCommand(db));
  program.addCommand(createListCommand(db));
  program.addCommand(createDashboardCommand(db));
  program.addCommand(createDoneCommand(db));
  program.addCommand(createUndoCommand(db));
  program.addCommand(createEditCommand(db));
  program.addCommand(createDeleteCommand(db));
  program.addCommand(createSubjectsCommand(db));

  return program;
}
