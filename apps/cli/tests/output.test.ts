import { describe, it, expect } from 'vitest';
import { formatDueLabel } from '../src/output.js';

const base = { isDone: false, overdue: false, soon: false, daysLeft: 5, dueDate: '2024-03-10' };

describe('formatDueLabel', () => {
  it('shows overdue days', () => {
    expect(formatDueLabel({ ...base, overdue: true, daysLeft: -3 })).toContain('OVERDUE (3d)');
  });

  it('names today and tomorrow', () => {
    expect(formatDueLabel({ ...base, soon: true, daysLeft: 0 })).toContain('Due: Today');
    expect(formatDueLabel({ ...base, soon: true, daysLeft: 1 })).toContain('Due: Tomorrow');
  });

  it('shows the date for later and done tasks', () => {
    expect(formatDueLabel(base)).toContain('Due: 2024-03-10 (5d)');
    expect(formatDueLabel({ ...base, isDone: true, overdue: false })).toContain('Due: 2024-03-10');
  });
});
