import { describe, it, expect } from 'vitest';
import { parseTaskForm } from '../../src/parsers/task-form-parser.js';

const valid = {
  title: '  Homework 3 ',
  task_type: ' quiz ',
  subject: ' Math ',
  due_date: '2024-03-10',
  description: '  see course page  ',
  priority: 'optional',
};

describe('parseTaskForm', () => {
  it('trims text fields', () => {
    const r = parseTaskForm(valid);
    expect(r).toEqual({
      ok: true,
      input: {
        title: 'Homework 3',
        taskType: 'quiz',
        subject: 'Math',
        dueDate: '2024-03-10',
        description: 'see course page',
        priority: 'optional',
      },
    });
  });

  it('defaults priority, task type and description', () => {
    const r = parseTaskForm({ title: 'A', subject: 'B', due_date: '2024-03-10', task_type: '   ', priority: '' });
    expect(r.ok && r.input).toEqual({
      title: 'A',
      taskType: 'exercise',
      subject: 'B',
      dueDate: '2024-03-10',
      description: '',
      priority: 'required',
    });
  });

  it('rejects a malformed due date without coercing it', () => {
    const r = parseTaskForm({ ...valid, due_date: '2024-02-30' });
    expect(r).toEqual({
      ok: false,
      issues: [{ field: 'due_date', message: 'Due date must be a valid YYYY-MM-DD date' }],
    });
  });

  it('reports missing required fields', () => {
    const r = parseTaskForm({ title: '   ', due_date: '2024-03-10' });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.issues).toEqual([
      { field: 'title', message: 'Title is required' },
      { field: 'subject', message: 'Subject is required' },
    ]);
  });

  it('rejects an unknown priority', () => {
    const r = parseTaskForm({ ...valid, priority: 'urgent' });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.issues.map(i => i.field)).toEqual(['priority']);
  });
});
