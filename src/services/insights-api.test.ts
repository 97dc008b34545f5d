import { describe, expect, it } from 'vitest';
import { AuthError, FetchError } from '../lib/errors';
import { fakeAdapter, insightsRoutes } from '../test-utils/fake-adapter';
import type { StorageType } from '../types/storage-insights';
import { StorageInsightsApi, parseTokenResponse, toStorageSystemRecord } from './insights-api';

const BASE_URL = 'https://insights.example.test/';
const credentials = { apiKey: 'test-key', tenantId: 'tenant-1' };
const token = { value: 'abc', expirationEpochMillis: 1700003600000 };

const apiWith = (route: Parameters<typeof fakeAdapter>[0]) => {
  const fake = fakeAdapter(route);
  return { api: new StorageInsightsApi({ baseUrl: BASE_URL, adapter: fake.adapter }), calls: fake.calls };
};

describe('parseTokenResponse', () => {
  it('returns token and expiration untransformed', () => {
    expect(parseTokenResponse({ result: { token: 'abc', expiration: 1700003600000 } })).toEqual({
      value: 'abc',
      expirationEpochMillis: 1700003600000,
    });
  });

  it('accepts a digit-string expiration', () => {
    expect(parseTokenResponse({ result: { token: 'abc', expiration: '1700003600000' } })).toEqual({
      value: 'abc',
      expirationEpochMillis: 1700003600000,
    });
  });

  it.each([
    ['missing token', { result: { expiration: 1700003600000 } }],
    ['missing expiration', { result: { token: 'abc' } }],
    ['fractional expiration', { result: { token: 'abc', expiration: 1.5 } }],
    ['missing result', { token: 'abc' }],
    ['non-object body', 'oops'],
  ])('rejects %s', (_label, body) => {
    expect(parseTokenResponse(body)).toBeNull();
  });
});

describe('toStorageSystemRecord', () => {
  it('keeps timestamps that are present but not numeric', () => {
    expect(
      toStorageSystemRecord({
        name: 's',
        last_successful_probe: '2023-11-14T22:13:20Z',
        last_successful_monitor: '1700000000000',
        condition: 'ok',
      })
    ).toEqual({
      name: 's',
      lastSuccessfulProbe: '2023-11-14T22:13:20Z',
      lastSuccessfulMonitor: 1700000000000,
      condition: 'ok',
    });
  });

  it('maps missing timestamps to null', () => {
    expect(toStorageSystemRecord({ name: 's', last_successful_probe: null })).toEqual({
      name: 's',
      lastSuccessfulProbe: null,
      lastSuccessfulMonitor: null,
      condition: '',
    });
  });
});

describe('StorageInsightsApi.requestToken', () => {
  it('posts the api key to the tenant token endpoint', async () => {
    const { api, calls } = apiWith(
      insightsRoutes({ token: { status: 200, data: { result: { token: 'abc', expiration: 1700003600000 } } } })
    );

    await expect(api.requestToken(credentials)).resolves.toEqual(token);

    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call.method).toBe('post');
    expect(call.baseURL).toBe('https://insights.example.test');
    expect(call.url).toBe('/restapi/v1/tenants/tenant-1/token');
    expect(call.data).toBe('{}');
    expect(call.headers.get('x-api-key')).toBe('test-key');
    expect(call.headers.get('Accept')).toBe('application/json');
  });

  it('encodes the tenant id in the path', async () => {
    const { api, calls } = apiWith(
      insightsRoutes({ token: { status: 200, data: { result: { token: 'abc', expiration: 1 } } } })
    );

    await api.requestToken({ apiKey: 'k', tenantId: 'a/b' });

    expect(calls[0].url).toBe('/restapi/v1/tenants/a%2Fb/token');
  });

  it('fails with AuthError on a non-success status', async () => {
    const { api } = apiWith(insightsRoutes({ token: { status: 401, data: { message: 'bad key' } } }));

    const err = await api.requestToken(credentials).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({
      code: 'AUTH',
      message:
        'HTTP 401 for https://insights.example.test/restapi/v1/tenants/tenant-1/token: {"message":"bad key"}',
      details: { status: 401 },
    });
  });

  it('fails with AuthError when result.token is missing', async () => {
    const { api } = apiWith(insightsRoutes({ token: { status: 200, data: { result: { expiration: 1 } } } }));

    await expect(api.requestToken(credentials)).rejects.toThrow(
      'Unexpected token response structure: {"result":{"expiration":1}}'
    );
  });

  it('fails with AuthError when the body is not JSON', async () => {
    const { api } = apiWith(insightsRoutes({ token: { status: 200, data: 'not json' } }));

    await expect(api.requestToken(credentials)).rejects.toBeInstanceOf(AuthError);
  });

  it('fails with AuthError when the service is unreachable, without retrying', async () => {
    const { api, calls } = apiWith(() => ({ networkError: 'connect ECONNREFUSED' }));

    await expect(api.requestToken(credentials)).rejects.toThrow(
      'Failed to reach https://insights.example.test/restapi/v1/tenants/tenant-1/token: connect ECONNREFUSED'
    );
    expect(calls).toHaveLength(1);
  });
});

describe('StorageInsightsApi.fetchStorageSystems', () => {
  const systems = {
    status: 200,
    data: {
      tenantId: 'tenant-1',
      storageType: 'block',
      data: [
        {
          name: 'sys1',
          last_successful_probe: 1700000000000,
          last_successful_monitor: null,
          condition: 'normal',
          serial_number: 'SN-1',
        },
        { name: 'sys2', condition: 'error' },
      ],
    },
  };

  it.each<[StorageType, Record<string, string> | undefined]>([
    ['block', { 'storage-type': 'block' }],
    ['filer', { 'storage-type': 'filer' }],
    ['object', { 'storage-type': 'object' }],
    ['', undefined],
  ])("sends storage type '%s' as the query filter", async (storageType, params) => {
    const { api, calls } = apiWith(insightsRoutes({ token: { status: 500 }, systems }));

    await api.fetchStorageSystems(token, 'tenant-1', storageType);

    expect(calls[0].params).toEqual(params);
  });

  it('sends the token header and maps records in order', async () => {
    const { api, calls } = apiWith(insightsRoutes({ token: { status: 500 }, systems }));

    const payload = await api.fetchStorageSystems(token, 'tenant-1', 'block');

    expect(calls[0].method).toBe('get');
    expect(calls[0].url).toBe('/restapi/v1/tenants/tenant-1/storage-systems');
    expect(calls[0].headers.get('x-api-token')).toBe('abc');
    expect(payload.tenantId).toBe('tenant-1');
    expect(payload.storageType).toBe('block');
    expect(payload.raw).toEqual(systems.data);
    expect(payload.systems).toEqual([
      {
        name: 'sys1',
        lastSuccessfulProbe: 1700000000000,
        lastSuccessfulMonitor: null,
        condition: 'normal',
      },
      { name: 'sys2', lastSuccessfulProbe: null, lastSuccessfulMonitor: null, condition: 'error' },
    ]);
  });

  it('treats a missing data field as an empty list', async () => {
    const { api } = apiWith(
      insightsRoutes({ token: { status: 500 }, systems: { status: 200, data: { tenantId: 'tenant-1' } } })
    );

    const payload = await api.fetchStorageSystems(token, 'tenant-1', '');

    expect(payload.systems).toEqual([]);
  });

  it('fails with FetchError on a non-success status', async () => {
    const { api } = apiWith(
      insightsRoutes({ token: { status: 500 }, systems: { status: 403, data: 'token expired' } })
    );

    await expect(api.fetchStorageSystems(token, 'tenant-1', 'block')).rejects.toThrow(
      new FetchError(
        'HTTP 403 for https://insights.example.test/restapi/v1/tenants/tenant-1/storage-systems: token expired'
      )
    );
  });

  it('fails with FetchError when data is not an array', async () => {
    const { api } = apiWith(
      insightsRoutes({ token: { status: 500 }, systems: { status: 200, data: { data: 'nope' } } })
    );

    await expect(api.fetchStorageSystems(token, 'tenant-1', 'block')).rejects.toBeInstanceOf(FetchError);
  });
});
