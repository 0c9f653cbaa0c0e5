/**
 * Dexcom Share API Client
 *
 * Session flow:
 * 1. AuthenticatePublisherAccount (account name + password) -> account id
 * 2. LoginPublisherAccountById (account id + password) -> session id
 * 3. ReadPublisherLatestGlucoseValues with the session id
 *
 * The session id is cached for a few minutes; an expired session is
 * re-established once per read.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  DEFAULT_UUID,
  DEXCOM_APPLICATION_IDS,
  DEXCOM_BASE_URLS,
  ENDPOINTS,
  isTrendDirection
} from './constants.js';
import {
  AccountError,
  ArgumentError,
  type DexcomError,
  DexcomErrorCode,
  ServerError,
  SessionError
} from './errors.js';
import { createReading } from './readings.js';
import { type DexcomConfig, type GlucoseSource, MAX_COUNT, MAX_MINUTES, type Reading } from './types.js';

const DEFAULT_SESSION_TTL_MS = 8 * 60 * 1000;
const CURRENT_READING_MINUTES = 10;

const DT_REGEX = /^Date\((\d+)([+-]\d{4})?\)$/;
const UUID_REGEX = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

const zAuthString = z.string().regex(UUID_REGEX);

const zRawGlucose = z.object({
  WT: z.string().optional(),
  ST: z.string().optional(),
  DT: z.string().regex(DT_REGEX),
  Value: z.coerce.number().int(),
  Trend: z.string().transform((trend, ctx) => {
    if (!isTrendDirection(trend)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown trend: ${trend}` });
      return z.NEVER;
    }
    return trend;
  })
});

const zRawGlucoseArray = z.array(zRawGlucose);

export type RawGlucoseReading = z.input<typeof zRawGlucose>;

const zErrorBody = z
  .object({
    Code: z.string().optional(),
    Message: z.string().optional()
  })
  .passthrough();

export interface DexcomClientOptions {
  /** Session TTL in ms (default 8 minutes). */
  sessionTtlMs?: number;
  /** Request timeout in ms (default 30 seconds). */
  timeoutMs?: number;
  /** Custom axios adapter, e.g. an in-process stand-in. */
  adapter?: AxiosAdapter;
}

/**
 * Parse "Date(1691455258000-0400)" into an instant and its UTC offset.
 */
export function parseDexcomDate(dt: string): { timestamp: number; utcOffsetMinutes: number } | null {
  const match = DT_REGEX.exec(dt);
  if (!match) return null;

  const timestamp = Number(match[1]);
  const zone = match[2];
  if (!zone) {
    return { timestamp, utcOffsetMinutes: 0 };
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const utcOffsetMinutes = sign * (Number(zone.slice(1, 3)) * 60 + Number(zone.slice(3, 5)));
  return { timestamp, utcOffsetMinutes };
}

/**
 * Map a Dexcom error body to the matching error class.
 */
export function mapErrorCode(body: unknown): DexcomError {
  const parsed = zErrorBody.safeParse(body);
  const code = parsed.success ? parsed.data.Code : undefined;
  const message = parsed.success ? parsed.data.Message : undefined;

  switch (code) {
    case 'SessionIdNotFound':
      return new SessionError(DexcomErrorCode.SESSION_NOT_FOUND);
    case 'SessionNotValid':
      return new SessionError(DexcomErrorCode.SESSION_INVALID);
    case 'AccountPasswordInvalid':
      return new AccountError(DexcomErrorCode.ACCOUNT_FAILED_AUTHENTICATION);
    case 'SSO_AuthenticateMaxAttemptsExceeded':
      return new AccountError(DexcomErrorCode.ACCOUNT_MAX_ATTEMPTS);
    case 'SSO_InternalError':
      if (message?.includes('Cannot Authenticate by AccountName') || message?.includes('Cannot Authenticate by AccountId')) {
        return new AccountError(DexcomErrorCode.ACCOUNT_FAILED_AUTHENTICATION);
      }
      break;
    case 'InvalidArgument':
      if (message?.includes('accountName')) return new ArgumentError(DexcomErrorCode.USERNAME_INVALID);
      if (message?.includes('password')) return new ArgumentError(DexcomErrorCode.PASSWORD_INVALID);
      if (message?.includes('UUID')) return new ArgumentError(DexcomErrorCode.ACCOUNT_ID_INVALID);
      break;
  }

  if (code && message) return new ServerError(DexcomErrorCode.SERVER_UNKNOWN_CODE);
  return new ServerError(DexcomErrorCode.SERVER_UNEXPECTED);
}

function toReading(raw: z.output<typeof zRawGlucose>): Reading {
  const time = parseDexcomDate(raw.DT);
  if (time === null) {
    throw new ArgumentError(DexcomErrorCode.GLUCOSE_READING_INVALID);
  }
  return createReading(raw.Value, time.timestamp, time.utcOffsetMinutes, raw.Trend);
}

export class DexcomShareClient implements GlucoseSource {
  private config: DexcomConfig;
  private http: AxiosInstance;
  private sessionTtlMs: number;
  private accountId: string | null = null;
  private sessionId: string | null = null;
  private sessionExpires: number = 0;

  constructor(config: DexcomConfig, options: DexcomClientOptions = {}) {
    this.config = config;
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.http = axios.create({
      baseURL: DEXCOM_BASE_URLS[config.region],
      headers: {
        'Accept-Encoding': 'application/json',
        'Content-Type': 'application/json'
      },
      timeout: options.timeoutMs ?? 30000,
      // Status codes are mapped to Dexcom errors below
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {})
    });
  }

  private async post(endpoint: string, body: Record<string, unknown>, params?: Record<string, unknown>): Promise<unknown> {
    const response = await this.http.post<unknown>(endpoint, body, { params });

    if (response.status < 200 || response.status >= 300) {
      throw mapErrorCode(response.data);
    }
    return response.data;
  }

  private isSessionValid(): boolean {
    return this.sessionId !== null && Date.now() < this.sessionExpires;
  }

  private clearSession(): void {
    this.sessionId = null;
    this.sessionExpires = 0;
  }

  private async obtainAccountId(): Promise<string> {
    const id = await this.post(ENDPOINTS.authenticate, {
      accountName: this.config.username,
      password: this.config.password,
      applicationId: DEXCOM_APPLICATION_IDS[this.config.region]
    });

    const parsed = zAuthString.safeParse(id);
    if (!parsed.success || parsed.data === DEFAULT_UUID) {
      throw new ArgumentError(DexcomErrorCode.ACCOUNT_ID_INVALID);
    }
    return parsed.data;
  }

  private async obtainSessionId(accountId: string): Promise<string> {
    const id = await this.post(ENDPOINTS.login, {
      accountId,
      password: this.config.password,
      applicationId: DEXCOM_APPLICATION_IDS[this.config.region]
    });

    const parsed = zAuthString.safeParse(id);
    if (!parsed.success || parsed.data === DEFAULT_UUID) {
      throw new ArgumentError(DexcomErrorCode.SESSION_ID_INVALID);
    }
    return parsed.data;
  }

  /**
   * Ensure we have a valid session, logging in when needed
   */
  private async ensureSession(): Promise<string> {
    if (this.sessionId !== null && this.isSessionValid()) {
      return this.sessionId;
    }

    if (!this.config.username) {
      throw new ArgumentError(DexcomErrorCode.USERNAME_INVALID);
    }
    if (!this.config.password) {
      throw new ArgumentError(DexcomErrorCode.PASSWORD_INVALID);
    }

    if (this.accountId === null) {
      this.accountId = await this.obtainAccountId();
    }
    const sessionId = await this.obtainSessionId(this.accountId);

    this.sessionId = sessionId;
    this.sessionExpires = Date.now() + this.sessionTtlMs;
    console.error(`Dexcom: session established (region ${this.config.region})`);

    return sessionId;
  }

  private async fetchReadings(minutes: number, maxCount: number): Promise<Reading[]> {
    const sessionId = await this.ensureSession();
    const data = await this.post(ENDPOINTS.readings, {}, { sessionId, minutes, maxCount });
    if (!Array.isArray(data)) {
      throw new ServerError(DexcomErrorCode.SERVER_INVALID_JSON);
    }

    const parsed = zRawGlucoseArray.safeParse(data);
    if (!parsed.success) {
      throw new ArgumentError(DexcomErrorCode.GLUCOSE_READING_INVALID);
    }
    return parsed.data.map(toReading);
  }

  /**
   * Up to `maxCount` readings within the last `minutes`, newest first.
   */
  async getReadings(minutes: number, maxCount: number): Promise<Reading[]> {
    if (!Number.isInteger(minutes) || minutes < 1 || minutes > MAX_MINUTES) {
      throw new ArgumentError(DexcomErrorCode.MINUTES_INVALID);
    }
    if (!Number.isInteger(maxCount) || maxCount < 1 || maxCount > MAX_COUNT) {
      throw new ArgumentError(DexcomErrorCode.MAX_COUNT_INVALID);
    }

    try {
      return await this.fetchReadings(minutes, maxCount);
    } catch (error) {
      if (error instanceof SessionError) {
        // Session expired server-side, log in again and retry once
        this.clearSession();
        return this.fetchReadings(minutes, maxCount);
      }
      throw error;
    }
  }

  /**
   * Most recent reading within the last 10 minutes, or null
   */
  async getCurrentReading(): Promise<Reading | null> {
    const readings = await this.getReadings(CURRENT_READING_MINUTES, 1);
    return readings[0] ?? null;
  }
}
