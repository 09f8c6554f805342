import { computeFingerprint } from '../src/modules/tasks/query/query-fingerprint';
import { OTHER_PROJECT_ID, PROJECT_ID, query } from './test-utils';

describe('computeFingerprint', () => {
  const base = computeFingerprint(query(), PROJECT_ID);

  it('should be 16 bytes of unpadded base64url', () => {
    expect(base).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it('should ignore the order of multi-valued filters', () => {
    expect(computeFingerprint(query({ status: 'todo,done', priority: 'low,high' }), PROJECT_ID)).toBe(
      computeFingerprint(query({ status: 'done,todo', priority: 'high,low' }), PROJECT_ID),
    );
  });

  it('should treat the doing alias as in_progress', () => {
    expect(computeFingerprint(query({ status: 'doing' }), PROJECT_ID)).toBe(
      computeFingerprint(query({ status: 'in_progress' }), PROJECT_ID),
    );
  });

  it('should ignore sort and limit', () => {
    expect(computeFingerprint(query({ sort: '-priority', limit: 10 }), PROJECT_ID)).toBe(base);
  });

  it('should depend on the project', () => {
    expect(computeFingerprint(query(), OTHER_PROJECT_ID)).not.toBe(base);
  });

  it.each([
    ['status', { status: 'todo' }],
    ['priority', { priority: 'high' }],
    ['assigneeId', { assigneeId: 'user-1' }],
    ['dueDateFrom', { dueDateFrom: '2026-01-01' }],
    ['dueDateTo', { dueDateTo: '2026-01-31' }],
    ['q', { q: 'release' }],
  ])('should change with %s', (_name, options) => {
    expect(computeFingerprint(query(options), PROJECT_ID)).not.toBe(base);
  });

  it('should keep free-text case', () => {
    expect(computeFingerprint(query({ q: 'Release' }), PROJECT_ID)).not.toBe(
      computeFingerprint(query({ q: 'release' }), PROJECT_ID),
    );
  });
});
