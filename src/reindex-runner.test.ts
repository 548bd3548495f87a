import { afterEach, describe, expect, it, vi } from 'vitest';
import { ReindexRunner, Reindexable } from './reindex-runner.js';
import { IndexRunResult } from './types.js';

const RESULT: IndexRunResult = { processed: 2, skipped: 1, errors: 0, removed: 0, total: 3 };

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ReindexRunner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs one pass at a time', async () => {
    const pending = deferred<IndexRunResult>();
    const target: Reindexable = { indexCorpus: vi.fn(() => pending.promise) };
    const runner = new ReindexRunner(target);

    expect(runner.start(true)).toEqual({ started: true, alreadyRunning: false });
    expect(runner.start()).toEqual({ started: false, alreadyRunning: true });
    expect(runner.isRunning()).toBe(true);
    expect(target.indexCorpus).toHaveBeenCalledTimes(1);
    expect(target.indexCorpus).toHaveBeenCalledWith(true);

    pending.resolve(RESULT);
    await runner.waitForIdle();

    expect(runner.isRunning()).toBe(false);
    expect(runner.getStatus()).toMatchObject({ running: false, lastResult: RESULT, lastError: null });
    expect(runner.getStatus().finishedAt).not.toBeNull();
  });

  it('accepts a new pass after the previous one finished', async () => {
    const target: Reindexable = { indexCorpus: vi.fn(async () => RESULT) };
    const runner = new ReindexRunner(target);

    runner.start();
    await runner.waitForIdle();

    expect(runner.start()).toEqual({ started: true, alreadyRunning: false });
    await runner.waitForIdle();
    expect(target.indexCorpus).toHaveBeenCalledTimes(2);
  });

  it('keeps the failure of the last pass', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const target: Reindexable = {
      indexCorpus: vi.fn(async () => {
        throw new Error('corpus unavailable');
      }),
    };
    const runner = new ReindexRunner(target);

    runner.start();
    await runner.waitForIdle();

    expect(runner.getStatus()).toMatchObject({ running: false, lastResult: null, lastError: 'corpus unavailable' });
  });

  it('reports an idle runner before any pass', async () => {
    const runner = new ReindexRunner({ indexCorpus: vi.fn(async () => RESULT) });

    await runner.waitForIdle();
    expect(runner.getStatus()).toEqual({
      running: false,
      startedAt: null,
      finishedAt: null,
      lastResult: null,
      lastError: null,
    });
  });
});
