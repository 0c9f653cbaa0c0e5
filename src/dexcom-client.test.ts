import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEXCOM_APPLICATION_IDS, ENDPOINTS } from './constants.js';
import { DexcomShareClient, mapErrorCode, parseDexcomDate } from './dexcom-client.js';
import { AccountError, ArgumentError, DexcomErrorCode, ServerError, SessionError } from './errors.js';

const ACCOUNT_ID = '11111111-2222-3333-4444-555555555555';
const SESSION_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';
const SECOND_SESSION_ID = 'ffffffff-bbbb-cccc-dddd-eeeeeeeeeeee';

const config = { username: 'test-user', password: 'test-secret', region: 'us' as const };

interface FakeResponse {
  status: number;
  data: unknown;
}

/** Answers requests in order and records each one. */
function fakeAdapter(responses: FakeResponse[]) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async requestConfig => {
    calls.push(requestConfig);
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${requestConfig.url}`);
    }
    return { data: next.data, status: next.status, statusText: '', headers: {}, config: requestConfig };
  };
  return { adapter, calls };
}

function bodyOf(call: InternalAxiosRequestConfig): unknown {
  return typeof call.data === 'string' ? JSON.parse(call.data) : call.data;
}

const rawReadings = [
  { WT: 'Date(1709294400000)', ST: 'Date(1709294400000)', DT: 'Date(1709294400000-0500)', Value: 120, Trend: 'Flat' },
  { WT: 'Date(1709294100000)', ST: 'Date(1709294100000)', DT: 'Date(1709294100000-0500)', Value: 115, Trend: 'FortyFiveUp' }
];

describe('parseDexcomDate', () => {
  it('reads the instant and offset', () => {
    expect(parseDexcomDate('Date(1691455258000-0400)')).toEqual({ timestamp: 1691455258000, utcOffsetMinutes: -240 });
    expect(parseDexcomDate('Date(1691455258000+0530)')).toEqual({ timestamp: 1691455258000, utcOffsetMinutes: 330 });
  });

  it('defaults to UTC without an offset', () => {
    expect(parseDexcomDate('Date(1691455258000)')).toEqual({ timestamp: 1691455258000, utcOffsetMinutes: 0 });
  });

  it('rejects anything else', () => {
    expect(parseDexcomDate('2024-03-01')).toBeNull();
  });
});

describe('mapErrorCode', () => {
  it('maps session errors', () => {
    const error = mapErrorCode({ Code: 'SessionIdNotFound', Message: 'Session ID not found' });
    expect(error).toBeInstanceOf(SessionError);
    expect(error.code).toBe(DexcomErrorCode.SESSION_NOT_FOUND);
  });

  it('maps account errors', () => {
    expect(mapErrorCode({ Code: 'AccountPasswordInvalid', Message: 'bad' })).toBeInstanceOf(AccountError);
    expect(
      mapErrorCode({ Code: 'SSO_InternalError', Message: 'Cannot Authenticate by AccountName' }).code
    ).toBe(DexcomErrorCode.ACCOUNT_FAILED_AUTHENTICATION);
  });

  it('maps argument errors', () => {
    const error = mapErrorCode({ Code: 'InvalidArgument', Message: 'accountName is empty' });
    expect(error).toBeInstanceOf(ArgumentError);
    expect(error.code).toBe(DexcomErrorCode.USERNAME_INVALID);
  });

  it('falls back to server errors', () => {
    expect(mapErrorCode({ Code: 'Other', Message: 'oops' }).code).toBe(DexcomErrorCode.SERVER_UNKNOWN_CODE);
    expect(mapErrorCode(null)).toBeInstanceOf(ServerError);
    expect(mapErrorCode('<html>').code).toBe(DexcomErrorCode.SERVER_UNEXPECTED);
  });
});

describe('DexcomShareClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('authenticates, logs in and reads', async () => {
    const { adapter, calls } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 200, data: rawReadings }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    const readings = await client.getReadings(60, 12);

    expect(calls.map(c => c.url)).toEqual([ENDPOINTS.authenticate, ENDPOINTS.login, ENDPOINTS.readings]);
    expect(bodyOf(calls[0])).toEqual({
      accountName: 'test-user',
      password: 'test-secret',
      applicationId: DEXCOM_APPLICATION_IDS.us
    });
    expect(bodyOf(calls[1])).toEqual({
      accountId: ACCOUNT_ID,
      password: 'test-secret',
      applicationId: DEXCOM_APPLICATION_IDS.us
    });
    expect(calls[2].params).toEqual({ sessionId: SESSION_ID, minutes: 60, maxCount: 12 });

    expect(readings).toHaveLength(2);
    expect(readings[0]).toEqual({
      value: 120,
      mmol: 6.7,
      timestamp: 1709294400000,
      utcOffsetMinutes: -300,
      trend: 'Flat'
    });
  });

  it('reuses the session', async () => {
    const { adapter, calls } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 200, data: rawReadings },
      { status: 200, data: rawReadings }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    await client.getReadings(60, 12);
    await client.getReadings(30, 6);

    expect(calls).toHaveLength(4);
    expect(calls[3].params).toEqual({ sessionId: SESSION_ID, minutes: 30, maxCount: 6 });
  });

  it('logs in again once when the session expired', async () => {
    const { adapter, calls } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 500, data: { Code: 'SessionIdNotFound', Message: 'Session ID not found' } },
      { status: 200, data: SECOND_SESSION_ID },
      { status: 200, data: [] }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getReadings(60, 12)).resolves.toEqual([]);
    expect(calls.map(c => c.url)).toEqual([
      ENDPOINTS.authenticate,
      ENDPOINTS.login,
      ENDPOINTS.readings,
      ENDPOINTS.login,
      ENDPOINTS.readings
    ]);
    expect(calls[4].params).toEqual({ sessionId: SECOND_SESSION_ID, minutes: 60, maxCount: 12 });
  });

  it('surfaces account errors', async () => {
    const { adapter } = fakeAdapter([
      { status: 500, data: { Code: 'AccountPasswordInvalid', Message: 'Password is invalid' } }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getReadings(60, 12)).rejects.toBeInstanceOf(AccountError);
  });

  it('rejects the all-zero account id', async () => {
    const { adapter } = fakeAdapter([{ status: 200, data: '00000000-0000-0000-0000-000000000000' }]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getReadings(60, 12)).rejects.toThrow(DexcomErrorCode.ACCOUNT_ID_INVALID);
  });

  it('validates arguments before any request', async () => {
    const { adapter, calls } = fakeAdapter([]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getReadings(0, 10)).rejects.toThrow(DexcomErrorCode.MINUTES_INVALID);
    await expect(client.getReadings(10, 300)).rejects.toThrow(DexcomErrorCode.MAX_COUNT_INVALID);
    expect(calls).toHaveLength(0);
  });

  it('requires credentials', async () => {
    const { adapter } = fakeAdapter([]);
    const client = new DexcomShareClient({ ...config, password: '' }, { adapter });

    await expect(client.getReadings(60, 12)).rejects.toThrow(DexcomErrorCode.PASSWORD_INVALID);
  });

  it('rejects malformed readings', async () => {
    const { adapter } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 200, data: [{ DT: 'nope', Value: 100, Trend: 'Flat' }] }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getReadings(60, 12)).rejects.toThrow(DexcomErrorCode.GLUCOSE_READING_INVALID);
  });

  it('fetches the current reading from the last 10 minutes', async () => {
    const { adapter, calls } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 200, data: rawReadings.slice(0, 1) }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    const current = await client.getCurrentReading();

    expect(current?.value).toBe(120);
    expect(calls[2].params).toEqual({ sessionId: SESSION_ID, minutes: 10, maxCount: 1 });
  });

  it('returns null without a recent reading', async () => {
    const { adapter } = fakeAdapter([
      { status: 200, data: ACCOUNT_ID },
      { status: 200, data: SESSION_ID },
      { status: 200, data: [] }
    ]);
    const client = new DexcomShareClient(config, { adapter });

    await expect(client.getCurrentReading()).resolves.toBeNull();
  });
});
