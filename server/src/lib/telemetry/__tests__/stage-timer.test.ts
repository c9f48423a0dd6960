import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { timeStage, timingKey, type TimedContext } from '../stage-timer.js';
import { TestLogger } from '../../../__tests__/support/test-logger.js';

function context(logger: TestLogger): TimedContext {
  return { requestId: 'req-1', log: logger.log, timings: {} };
}

describe('stage timer', () => {
  it('derives camel-case timing keys', () => {
    assert.equal(timingKey('fetch_candidates'), 'fetchCandidatesMs');
    assert.equal(timingKey('admit'), 'admitMs');
  });

  it('records the duration and logs start and completion', async () => {
    const logger = new TestLogger();
    const ctx = context(logger);

    assert.equal(await timeStage(ctx, 'admit', async () => 'ok'), 'ok');

    assert.equal(typeof ctx.timings.admitMs, 'number');
    assert.equal(logger.find('stage_started')?.level, 'info');
    assert.equal(logger.find('stage_completed')?.stage, 'admit');
  });

  it('logs minor stages at debug', async () => {
    const logger = new TestLogger();
    await timeStage(context(logger), 'explain', async () => undefined);
    assert.equal(logger.find('stage_completed')?.level, 'debug');
  });

  it('logs failures and rethrows', async () => {
    const logger = new TestLogger();
    const ctx = context(logger);

    await assert.rejects(timeStage(ctx, 'score', async () => { throw new TypeError('bad input'); }), TypeError);

    const failed = logger.find('stage_failed');
    assert.equal(failed?.level, 'warn');
    assert.equal(failed?.error, 'bad input');
    assert.equal(failed?.errorName, 'TypeError');
    assert.equal(typeof ctx.timings.scoreMs, 'number');
  });
});
