/**
 * Suggested task type labels. Stored as free text, so anything else is
 * accepted too; these only populate form pickers and CLI help.
 */
export const TASK_TYPES = ['quiz', 'exercise', 'colloquium', 'exam'] as const;

export type KnownTaskType = (typeof TASK_TYPES)[number];

export const DEFAULT_TASK_TYPE: KnownTaskType = 'exercise';
