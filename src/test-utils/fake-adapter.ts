import {
  type AxiosAdapter,
  AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export type FakeReply = { status: number; data?: unknown } | { networkError: string };

export type FakeRoute = (config: InternalAxiosRequestConfig) => FakeReply;

/**
 * In-process axios transport. Non-2xx replies reject with an AxiosError the same way
 * axios' own adapters settle them.
 */
export function fakeAdapter(route: FakeRoute): { adapter: AxiosAdapter; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = route(config);

    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };

    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };

  return { adapter, calls };
}

/** Routes token and storage-systems calls to fixed replies. */
export function insightsRoutes(replies: { token: FakeReply; systems?: FakeReply }): FakeRoute {
  return (config) => {
    if (config.url?.endsWith('/token')) return replies.token;
    if (config.url?.endsWith('/storage-systems') && replies.systems) return replies.systems;
    return { status: 404, data: { message: `no route for ${config.url}` } };
  };
}
