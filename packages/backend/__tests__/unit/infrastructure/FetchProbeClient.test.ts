import { describe, expect, it, jest } from '@jest/globals';
import { errors } from 'undici';
import {
  FetchProbeClient,
  ProbeTimeoutError,
  type FetchLike,
} from '@infrastructure/http/FetchProbeClient.js';

describe('FetchProbeClient', () => {
  it('应该返回响应状态码并释放响应体', async () => {
    const cancel = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const fetchFn = jest
      .fn<FetchLike>()
      .mockResolvedValue({ status: 204, body: { cancel } });
    const client = new FetchProbeClient({ fetchFn });

    const response = await client.get('http://svc.test/health', 1000);

    expect(response).toEqual({ status: 204 });
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      'http://svc.test/health',
      expect.objectContaining({ method: 'GET' }),
    );
  });

  it('超时后应该中止请求并抛出 ProbeTimeoutError', async () => {
    const fetchFn: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener('abort', () =>
          reject(new Error('This operation was aborted')),
        );
      });
    const client = new FetchProbeClient({ fetchFn });

    await expect(client.get('http://slow.test/health', 20)).rejects.toBeInstanceOf(
      ProbeTimeoutError,
    );
  });

  it('建立连接超时也视为探测超时', async () => {
    const fetchFn = jest.fn<FetchLike>().mockRejectedValue(
      new TypeError('fetch failed', {
        cause: new errors.ConnectTimeoutError('Connect Timeout Error'),
      }),
    );
    const client = new FetchProbeClient({ fetchFn });

    const error = await client
      .get('http://unreachable.test/health', 1000)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProbeTimeoutError);
    expect(error).toMatchObject({
      url: 'http://unreachable.test/health',
      timeoutMs: 1000,
    });
  });

  it('连接错误应该原样抛出', async () => {
    const fetchFn = jest
      .fn<FetchLike>()
      .mockRejectedValue(new Error('connect ECONNREFUSED'));
    const client = new FetchProbeClient({ fetchFn });

    await expect(client.get('http://down.test/health', 1000)).rejects.toThrow(
      'connect ECONNREFUSED',
    );
  });
});
