import { Agent, errors, fetch } from 'undici';

/**
 * 探测响应，只关心状态码
 */
export interface ProbeResponse {
  status: number;
}

/**
 * 健康探测客户端接口
 */
export interface ProbeClient {
  /**
   * 对 URL 发起一次 GET 探测
   * @throws ProbeTimeoutError 请求或建立连接超时
   */
  get(url: string, timeoutMs: number): Promise<ProbeResponse>;
}

/**
 * 探测超时
 */
export class ProbeTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    Object.setPrototypeOf(this, ProbeTimeoutError.prototype);
  }
}

/**
 * 建立连接超时；undici fetch 会把它包装为 cause
 */
function isConnectTimeout(error: unknown): boolean {
  if (error instanceof errors.ConnectTimeoutError) {
    return true;
  }
  return error instanceof Error && error.cause instanceof errors.ConnectTimeoutError;
}

/**
 * 可替换的 fetch 函数签名，测试中注入替身
 */
export type FetchLike = (
  url: string,
  init: { method: 'GET'; signal: AbortSignal; dispatcher?: Agent },
) => Promise<{
  status: number;
  body?: { cancel(): Promise<void> } | null;
}>;

/**
 * 基于 undici 的探测客户端
 * 每次探测使用独立的 AbortController 控制超时
 */
export class FetchProbeClient implements ProbeClient {
  private readonly agent: Agent | undefined;
  private readonly fetchFn: FetchLike;

  /**
   * @param options.connectTimeoutMs 建立连接的超时（毫秒）
   * @param options.fetchFn 自定义 fetch，缺省为 undici fetch
   */
  constructor(options: { connectTimeoutMs?: number; fetchFn?: FetchLike } = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.agent = options.fetchFn
      ? undefined
      : new Agent({ connect: { timeout: options.connectTimeoutMs ?? 10000 } });
  }

  async get(url: string, timeoutMs: number): Promise<ProbeResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        signal: controller.signal,
        dispatcher: this.agent,
      });
      // 不读取响应体，释放连接
      if (response.body) {
        await response.body.cancel();
      }
      return { status: response.status };
    } catch (error) {
      if (controller.signal.aborted || isConnectTimeout(error)) {
        throw new ProbeTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * 关闭连接池
   */
  async close(): Promise<void> {
    if (this.agent) {
      await this.agent.close();
    }
  }
}
