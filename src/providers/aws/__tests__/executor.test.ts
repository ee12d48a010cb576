import { describe, it, expect, vi } from 'vitest';
import { ClientCache } from '../client';
import { AwsOperationExecutor, mergePages } from '../executor';
import type { ServiceModels } from '../services';
import { createFakeSdk, FAKE_MODELS } from './fake-sdk';

const NO_WAIT = { minDelayMs: 0, maxDelayMs: 0, jitter: 0 };

function listThings(params: Record<string, unknown> = {}) {
  return { service: 'things', region: 'eu-west-1', operation: 'ListThings', params };
}

function throttled(): Error {
  return Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
}

describe('mergePages', () => {
  it('concatenates list fields and keeps the last scalar', () => {
    expect(
      mergePages([
        { Things: ['a', 'b'], NextToken: 't1', Owner: 'x' },
        { Things: ['c'], Owner: undefined },
      ])
    ).toEqual({ Things: ['a', 'b', 'c'], NextToken: 't1', Owner: 'x' });
  });

  it('returns an empty object for no pages', () => {
    expect(mergePages([])).toEqual({});
  });
});

describe('AwsOperationExecutor', () => {
  it('drains pagination into one response', async () => {
    const sdk = createFakeSdk();
    sdk.respond(async (_operation, input) => {
      if (input.NextToken === undefined) return { Things: ['a'], NextToken: 't1' };
      if (input.NextToken === 't1') return { Things: ['b'], NextToken: 't2' };
      return { Things: ['c'] };
    });
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader), {
      retry: NO_WAIT,
    });

    const outcome = await executor.execute(listThings({ MaxResults: 10 }));

    expect(outcome).toEqual({ ok: true, response: { Things: ['a', 'b', 'c'], NextToken: 't2' }, pages: 3 });
    expect(sdk.sent.map((s) => s.input)).toEqual([
      { MaxResults: 10 },
      { MaxResults: 10, NextToken: 't1' },
      { MaxResults: 10, NextToken: 't2' },
    ]);
  });

  it('stops when a service echoes the same token back', async () => {
    const sdk = createFakeSdk();
    sdk.respond(async () => ({ Things: ['a'], NextToken: 'same' }));
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader));

    const outcome = await executor.execute(listThings());

    expect(outcome.ok && outcome.pages).toBe(2);
    expect(sdk.sent).toHaveLength(2);
  });

  it('stops at the page limit', async () => {
    const sdk = createFakeSdk();
    let page = 0;
    sdk.respond(async () => {
      page += 1;
      return { Things: [page], NextToken: `t${page}` };
    });
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader), {
      maxPages: 3,
    });

    const outcome = await executor.execute(listThings());

    expect(outcome).toEqual({ ok: true, response: { Things: [1, 2, 3], NextToken: 't3' }, pages: 3 });
  });

  it('does not paginate operations without a token', async () => {
    const sdk = createFakeSdk();
    sdk.respond(async () => ({ Widgets: [], NextToken: 'ignored' }));
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader));

    const outcome = await executor.execute({
      service: 'things',
      region: 'eu-west-1',
      operation: 'DescribeWidgets',
      params: {},
    });

    expect(outcome).toEqual({ ok: true, response: { Widgets: [], NextToken: 'ignored' }, pages: 1 });
  });

  it('retries throttled pages and reports each retry', async () => {
    const sdk = createFakeSdk();
    let calls = 0;
    sdk.respond(async () => {
      calls += 1;
      if (calls === 1) throw throttled();
      return { Things: ['a'] };
    });
    const onRetry = vi.fn();
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader), {
      retry: { ...NO_WAIT, attempts: 3 },
      onRetry,
    });

    const outcome = await executor.execute(listThings());

    expect(outcome).toEqual({ ok: true, response: { Things: ['a'] }, pages: 1 });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ operation: 'ListThings', region: 'eu-west-1' });
    expect(onRetry.mock.calls[0][1]).toMatchObject({ attempt: 1, maxAttempts: 3, label: 'things.ListThings@eu-west-1' });
  });

  it('reports throttling once the attempts run out', async () => {
    const sdk = createFakeSdk();
    sdk.respond(async () => {
      throw throttled();
    });
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader), {
      retry: { ...NO_WAIT, attempts: 2 },
    });

    const outcome = await executor.execute(listThings());

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'throttling', code: 'ThrottlingException', message: 'Rate exceeded' },
    });
    expect(sdk.sent).toHaveLength(2);
  });

  it('turns an access error into a failed outcome without retrying', async () => {
    const sdk = createFakeSdk();
    sdk.respond(async () => {
      throw Object.assign(new Error('User is not authorized to perform: things:ListThings'), {
        name: 'AccessDeniedException',
      });
    });
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader), {
      retry: NO_WAIT,
    });

    const outcome = await executor.execute(listThings());

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'access_denied',
        code: 'AccessDeniedException',
        message: 'User is not authorized to perform: things:ListThings',
      },
    });
    expect(sdk.sent).toHaveLength(1);
  });

  it('reports a missing SDK package as an unknown failure', async () => {
    const models: ServiceModels = {
      gone: { ...FAKE_MODELS.things, sdkPackage: 'fake-client-gone' },
    };
    const sdk = createFakeSdk();
    const executor = new AwsOperationExecutor(models, new ClientCache(models, sdk.loader));

    const outcome = await executor.execute({ service: 'gone', region: 'eu-west-1', operation: 'ListThings', params: {} });

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'unknown',
        code: 'Error',
        message: 'Failed to import fake-client-gone. Run: npm install fake-client-gone',
      },
    });
  });

  it('reports an operation the package does not export', async () => {
    const sdk = createFakeSdk(['ListThings']);
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader));

    const outcome = await executor.execute({
      service: 'things',
      region: 'eu-west-1',
      operation: 'DescribeWidgets',
      params: {},
    });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'unknown', code: 'Error', message: 'Could not find DescribeWidgetsCommand in fake-client-things' },
    });
  });

  it('destroys its clients on close', async () => {
    const sdk = createFakeSdk();
    const executor = new AwsOperationExecutor(FAKE_MODELS, new ClientCache(FAKE_MODELS, sdk.loader));

    await executor.execute(listThings());
    await executor.execute({ ...listThings(), region: 'us-east-1' });
    await executor.close();

    expect(sdk.clients.map((c) => c.destroyed)).toEqual([true, true]);
  });
});
