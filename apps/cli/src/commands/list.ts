import { Command } from 'commander';
import chalk from 'chalk';
import type { TrackerDb } from '@duetrack/core';
import { BUCKETS, getDashboard, getSubjects, parseRange, todayISO, GLOBAL_SCOPE } from '@duetrack/core';
import * as out from '../output.js';
import { withErrorHandling } from '../helpers.js';

interface ListOptions {
  subject?: string;
  range?: string;
  showDone?: boolean;
}

export function createListCommand(db: TrackerDb): Command {
  return new Command('list')
    .description('List tasks sorted by due date')
    .option('-s, --subject <subject>', 'Only this subject (exact match)')
    .option('-r, --range <range>', `Only one range (${BUCKETS.join(', ')})`)
    .option('-a, --show-done', 'Include done tasks when no range is given')
    .action(withErrorHandling((opts: ListOptions) => {
      if (opts.range && parseRange(opts.range) == null) {
        out.warning(`Unknown range '${opts.range}', showing all`);
      }
      const dash = getDashboard(db, GLOBAL_SCOPE, opts, todayISO());
      if (dash.tasks.length === 0) {
        out.info('No tasks found... use the add command to create one');
        return;
      }
      for (const task of dash.tasks) console.log(out.formatTask(task));
    }));
}

export function createDashboardCommand(db: TrackerDb): Command {
  return new Command('dashboard')
    .description('Outstanding tasks grouped by urgency')
    .action(withErrorHandling(() => {
      const dash = getDashboard(db, GLOBAL_SCOPE, {}, todayISO());
      for (const bucket of BUCKETS) {
        const tasks = dash.overview[bucket];
        console.log(chalk.bold.underline(`${out.BUCKET_TITLES[bucket]} (${tasks.length})`));
        for (const task of tasks) console.log(out.formatTask(task));
        console.log();
      }
    }));
}

export function createSubjectsCommand(db: TrackerDb): Command {
  return new Command('subjects')
    .description('List subjects in use')
    .action(withErrorHandling(() => {
      const subjects = getSubjects(db, GLOBAL_SCOPE);
      if (subjects.length === 0) out.info('No subjects yet');
      for (const s of subjects) out.info(s);
    }));
}
