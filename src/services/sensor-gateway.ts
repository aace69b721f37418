/**
 * Sensor Gateway
 *
 * Boundary to the building-automation bridge that owns the sensors and the
 * heat pump. The engine reads snapshots and blocking state through it and
 * writes the outlet command and status report back.
 *
 * Bridge endpoints (JSON):
 *   GET  {base}/snapshot   flat snapshot record
 *   GET  {base}/blocking   { blocking, outletTempActual }
 *   POST {base}/command    { outletTemp }
 *   POST {base}/status     StatusReport
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { BlockingReading, RawSnapshot, StatusReport } from '../types';
import { Logger } from '../util/logger';
import { NetworkError } from '../util/error-handler';
import { isRecord } from '../util/validation';
import { CircuitBreakerOptions } from '../util/circuit-breaker';
import { parseBlockingReading } from './snapshot-parser';
import { DEFAULT_RETRY_OPTIONS, RetryOptions, ServiceBase } from './base/service-base';

export interface SensorGateway {
  readSnapshot(): Promise<RawSnapshot>;
  readBlockingState(): Promise<BlockingReading>;
  writeOutletCommand(outletTemp: number): Promise<void>;
  publishStatus(report: StatusReport): Promise<void>;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpSensorGatewayOptions {
  baseUrl: string;
  token?: string;
  requestTimeoutMs?: number;
  retry?: RetryOptions;
  circuit?: Partial<CircuitBreakerOptions>;
  fetchImpl?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export class HttpSensorGateway extends ServiceBase implements SensorGateway {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: HttpSensorGatewayOptions, logger: Logger) {
    const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    super(
      logger,
      { timeout: requestTimeoutMs * 2, ...options.circuit },
      options.retry ?? DEFAULT_RETRY_OPTIONS,
      options.sleep
    );
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token ?? '';
    this.requestTimeoutMs = requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async readSnapshot(): Promise<RawSnapshot> {
    return this.executeWithRetry(() => this.getRecord('snapshot'), 'Read snapshot');
  }

  async readBlockingState(): Promise<BlockingReading> {
    const raw = await this.executeWithRetry(() => this.getRecord('blocking'), 'Read blocking state');
    return parseBlockingReading(raw);
  }

  async writeOutletCommand(outletTemp: number): Promise<void> {
    await this.executeWithRetry(() => this.post('command', { outletTemp }), 'Write outlet command');
    this.logDebug(`Outlet command ${outletTemp}°C written`);
  }

  async publishStatus(report: StatusReport): Promise<void> {
    await this.executeWithRetry(() => this.post('status', report), 'Publish status');
  }

  private async getRecord(path: string): Promise<RawSnapshot> {
    const response = await this.request(path, 'GET');
    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new NetworkError(`Unexpected ${path} payload: expected a JSON object`);
    }
    return body;
  }

  private async post(path: string, payload: unknown): Promise<void> {
    await this.request(path, 'POST', JSON.stringify(payload));
  }

  private async request(path: string, method: 'GET' | 'POST', body?: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      const init: RequestInit = { method, headers, signal: controller.signal };
      if (body !== undefined) {
        init.body = body;
      }
      const response = await this.fetchImpl(`${this.baseUrl}/${path}`, init);
      if (!response.ok) {
        throw new NetworkError(`HTTP ${response.status} ${response.statusText} from ${path}`, undefined, {
          status: response.status
        });
      }
      return response;
    } finally {
      clearTimeout(timer);
    }
  }
}
