// apps/api/src/common/log-context.spec.ts
import {
  formatLogTag,
  getLogContext,
  runWithLogContext,
  tagIntent,
} from './log-context';

describe('log context', () => {
  it('has no tag outside a request', () => {
    expect(getLogContext()).toBeUndefined();
    expect(formatLogTag()).toBeUndefined();
  });

  it('tags lines with the request id and, once known, the intent', () => {
    runWithLogContext({ requestId: 'req-1' }, () => {
      expect(formatLogTag()).toBe('[reqId=req-1]');
      tagIntent('placeOrder');
      expect(formatLogTag()).toBe('[reqId=req-1 intent=placeOrder]');
    });
  });

  it('ignores intent tags outside a request', () => {
    tagIntent('welcome');
    expect(getLogContext()).toBeUndefined();
  });
});
