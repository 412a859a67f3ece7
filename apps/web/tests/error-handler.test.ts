import { describe, it, expect } from 'vitest';
import { clientErrorStatus } from '../src/middleware/error-handler.js';

describe('clientErrorStatus', () => {
  it('reads status or statusCode in the 4xx range', () => {
    expect(clientErrorStatus(Object.assign(new Error('bad json'), { status: 400 }))).toBe(400);
    expect(clientErrorStatus(Object.assign(new Error('too large'), { statusCode: 413 }))).toBe(413);
  });

  it('ignores server statuses and plain errors', () => {
    expect(clientErrorStatus(Object.assign(new Error('boom'), { status: 503 }))).toBeNull();
    expect(clientErrorStatus(new Error('boom'))).toBeNull();
    expect(clientErrorStatus('boom')).toBeNull();
    expect(clientErrorStatus({ status: '400' })).toBeNull();
  });
});
