import { fetchPage, fetchPageWithRetry, HttpStatusError, isRetryableStatus, type FetchLike } from '../http';
import { createMockResponse, createTestConfig, TEST_LISTING_URL } from '../../__tests__/helpers';

describe('fetchPage', () => {
  const { http } = createTestConfig();

  it('returns the response body as text', async () => {
    const fetchImpl = jest.fn(async (_input: string, _init?: RequestInit) => createMockResponse('<html>ok</html>'));

    await expect(fetchPage(TEST_LISTING_URL, http, fetchImpl)).resolves.toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledWith(TEST_LISTING_URL, expect.objectContaining({
      signal: expect.any(AbortSignal)
    }));
  });

  it('throws HttpStatusError for non-2xx responses', async () => {
    const fetchImpl = async () => createMockResponse('boom', 500, 'Internal Server Error');

    const error = await fetchPage(TEST_LISTING_URL, http, fetchImpl).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      status: 500,
      url: TEST_LISTING_URL,
      message: 'HTTP 500: Internal Server Error'
    });
  });

  it('aborts requests that exceed the timeout', async () => {
    const { http: fastHttp } = createTestConfig({ REQUEST_TIMEOUT_MS: '10' });
    const hanging: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abort = new Error('This operation was aborted');
          abort.name = 'AbortError';
          reject(abort);
        });
      });

    await expect(fetchPage(TEST_LISTING_URL, fastHttp, hanging)).rejects.toThrow(
      `Request to ${TEST_LISTING_URL} failed: timed out after 10ms`
    );
  });
});

describe('fetchPageWithRetry', () => {
  const { http } = createTestConfig({ LISTING_FETCH_RETRIES: '2', RETRY_MIN_TIMEOUT_MS: '0' });

  it('retries server errors until a request succeeds', async () => {
    const fetchImpl = jest
      .fn(async (_input: string, _init?: RequestInit) => createMockResponse('<html>ok</html>'))
      .mockImplementationOnce(async () => createMockResponse('unavailable', 503, 'Service Unavailable'));

    await expect(fetchPageWithRetry(TEST_LISTING_URL, http, fetchImpl)).resolves.toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('retries network failures', async () => {
    const fetchImpl = jest
      .fn(async (_input: string, _init?: RequestInit) => createMockResponse('<html>ok</html>'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(fetchPageWithRetry(TEST_LISTING_URL, http, fetchImpl)).resolves.toBe('<html>ok</html>');
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const fetchImpl = jest.fn(async (_input: string, _init?: RequestInit) =>
      createMockResponse('missing', 404, 'Not Found')
    );

    await expect(fetchPageWithRetry(TEST_LISTING_URL, http, fetchImpl)).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of retries', async () => {
    const fetchImpl = jest.fn(async (_input: string, _init?: RequestInit) =>
      createMockResponse('boom', 500, 'Internal Server Error')
    );

    await expect(fetchPageWithRetry(TEST_LISTING_URL, http, fetchImpl)).rejects.toMatchObject({ status: 500 });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });
});

describe('isRetryableStatus', () => {
  it.each([
    [500, true],
    [503, true],
    [429, true],
    [404, false],
    [403, false]
  ])('status %i retryable: %s', (status, expected) => {
    expect(isRetryableStatus(status)).toBe(expected);
  });
});
