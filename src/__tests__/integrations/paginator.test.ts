import { RequestExecutor, QueryParams } from '../../integrations/pulselive/pulselive-api-client';
import { paginate, walkPages } from '../../integrations/pulselive/paginator';
import { QueryException, TransientNetworkException } from '../../utils/exceptions';

// ---------- Helpers ----------

interface FakeBody {
  content: number[];
  pageInfo?: { numPages: number; numEntries: number };
}

type PageInfoFor = (total: number, pageSize: number) => FakeBody['pageInfo'];

const accuratePageInfo: PageInfoFor = (total, pageSize) => ({
  numPages: Math.ceil(total / pageSize),
  numEntries: total,
});

/** Executor serving `total` sequential integers with the given pageInfo (none when omitted). */
function createExecutor(
  total: number,
  pageInfoFor: PageInfoFor | null = accuratePageInfo
): RequestExecutor & { execute: jest.Mock } {
  const items = Array.from({ length: total }, (_, i) => i);
  return {
    execute: jest.fn(async (_path: string, params: QueryParams = {}): Promise<FakeBody> => {
      const page = Number(params.page);
      const pageSize = Number(params.pageSize);
      const content = items.slice(page * pageSize, (page + 1) * pageSize);
      const pageInfo = pageInfoFor ? pageInfoFor(total, pageSize) : undefined;
      return pageInfo ? { content, pageInfo } : { content };
    }),
  };
}

function isFakeBody(body: unknown): body is FakeBody {
  return typeof body === 'object' && body !== null && 'content' in body && Array.isArray(body.content);
}

const extract = (body: unknown) => {
  if (!isFakeBody(body)) throw new Error('unexpected body');
  return { items: body.content, pageInfo: body.pageInfo };
};

// ===========================================================================

describe('paginate', () => {
  it.each([
    [120, 50, 3],
    [100, 50, 2],
    [49, 50, 1],
    [50, 50, 1],
    [1, 10, 1],
  ])('should fetch %i items of page size %i in %i request(s)', async (total, pageSize, requests) => {
    const executor = createExecutor(total);

    const items = await paginate(executor, 'players', {}, { pageSize, extract });

    expect(items).toHaveLength(total);
    expect(executor.execute).toHaveBeenCalledTimes(requests);
  });

  it('should make exactly one request for an empty first page', async () => {
    const executor = createExecutor(0);

    const items = await paginate(executor, 'players', {}, { pageSize: 50, extract });

    expect(items).toEqual([]);
    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  it('should need one extra empty page when pageInfo is absent and the total is an exact multiple', async () => {
    const executor = createExecutor(100, null);

    const items = await paginate(executor, 'players', {}, { pageSize: 50, extract });

    expect(items).toHaveLength(100);
    expect(executor.execute).toHaveBeenCalledTimes(3);
  });

  it('should keep walking past a page that an understated numPages marks as last', async () => {
    const executor = createExecutor(100, () => ({ numPages: 1, numEntries: 100 }));

    const items = await paginate(executor, 'players', {}, { pageSize: 50, extract });

    expect(items).toHaveLength(100);
    expect(executor.execute).toHaveBeenCalledTimes(3);
  });

  it('should preserve upstream order across pages', async () => {
    const executor = createExecutor(7);

    const items = await paginate(executor, 'players', {}, { pageSize: 3, extract });

    expect(items).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('should send page and pageSize alongside the caller params', async () => {
    const executor = createExecutor(5);

    await paginate(executor, 'players', { compSeasons: '719' }, { pageSize: 3, extract });

    expect(executor.execute.mock.calls).toEqual([
      ['players', { compSeasons: '719', page: 0, pageSize: 3 }],
      ['players', { compSeasons: '719', page: 1, pageSize: 3 }],
    ]);
  });

  it('should truncate to the limit and stop requesting', async () => {
    const executor = createExecutor(150);

    const items = await paginate(executor, 'players', {}, { pageSize: 50, limit: 70, extract });

    expect(items).toHaveLength(70);
    expect(items[69]).toBe(69);
    expect(executor.execute).toHaveBeenCalledTimes(2);
  });

  it('should return nothing and make no request for a zero limit', async () => {
    const executor = createExecutor(10);

    const items = await paginate(executor, 'players', {}, { pageSize: 5, limit: 0, extract });

    expect(items).toEqual([]);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('should report completed pages when a transient failure interrupts the walk', async () => {
    const executor = createExecutor(300);
    const healthy = executor.execute.getMockImplementation();
    executor.execute.mockImplementation(async (path: string, params: QueryParams = {}) => {
      if (params.page === 2) {
        throw new TransientNetworkException('Upstream request to players failed after 3 attempt(s): reset', 3, {
          path,
        });
      }
      return healthy ? healthy(path, params) : undefined;
    });

    const error = await paginate(executor, 'players', {}, { pageSize: 50, extract }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientNetworkException);
    expect(error).toMatchObject({
      attempts: 3,
      context: { path: 'players', pagesCompleted: 2, attempts: 3 },
      message: 'Upstream request to players failed after 3 attempt(s): reset (after 2 page(s))',
    });
  });

  it('should pass other failures through untouched', async () => {
    const failure = new QueryException('Upstream rejected players with status 400');
    const executor: RequestExecutor = { execute: jest.fn().mockRejectedValue(failure) };

    await expect(paginate(executor, 'players', {}, { pageSize: 10, extract })).rejects.toBe(failure);
  });
});

describe('walkPages', () => {
  it('should fetch lazily as items are consumed', async () => {
    const executor = createExecutor(30);
    const walk = walkPages(executor, 'players', {}, { pageSize: 10, extract });

    const first = await walk.next();

    expect(first).toEqual({ value: 0, done: false });
    expect(executor.execute).toHaveBeenCalledTimes(1);
    await walk.return(undefined);
  });

  it('should start a fresh walk from page 0 when re-invoked', async () => {
    const executor = createExecutor(4);

    await paginate(executor, 'players', {}, { pageSize: 3, extract });
    await paginate(executor, 'players', {}, { pageSize: 3, extract });

    const pages = executor.execute.mock.calls.map(([, params]) => params.page);
    expect(pages).toEqual([0, 1, 0, 1]);
  });
});
