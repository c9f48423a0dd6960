import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TimeoutError, isTimeoutError, sleep, withDeadline, withTimeout } from '../timeout-guard.js';

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    assert.equal(await withTimeout(Promise.resolve(7), 50, 'fast'), 7);
  });

  it('rejects with TimeoutError and calls onTimeout', async () => {
    let timedOut = false;
    await assert.rejects(
      withTimeout(sleep(200), 10, 'slow_op', () => { timedOut = true; }),
      (err: unknown) => {
        assert.ok(isTimeoutError(err));
        assert.equal(err.operation, 'slow_op');
        assert.equal(err.message, 'slow_op timed out after 10ms');
        return true;
      }
    );
    assert.equal(timedOut, true);
  });
});

describe('withDeadline', () => {
  it('aborts the child signal when the deadline passes', async () => {
    let childSignal: AbortSignal | undefined;
    await assert.rejects(
      withDeadline('lookup', 10, undefined, signal => {
        childSignal = signal;
        return sleep(200);
      }),
      TimeoutError
    );
    assert.equal(childSignal?.aborted, true);
  });

  it('propagates a parent abort to the child', async () => {
    const parent = new AbortController();
    const pending = withDeadline('lookup', 1000, parent.signal, signal =>
      new Promise<never>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('child aborted')), { once: true });
      })
    );
    parent.abort();
    await assert.rejects(pending, /child aborted/);
  });

  it('starts aborted when the parent already is', async () => {
    const parent = new AbortController();
    parent.abort(new Error('gone'));
    await assert.rejects(
      withDeadline('lookup', 1000, parent.signal, async signal => {
        signal.throwIfAborted();
        return 1;
      }),
      /gone/
    );
  });
});
