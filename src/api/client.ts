import type { Logging } from 'homebridge';

import { DEFAULT_HOST, PLANT_MODE } from '../settings.js';
import type { Session } from './session.js';
import { createSession, sessionAuthenticated, sessionExpired, sessionFailed } from './session.js';
import type { AristonClientConfig, PlantStatus, VelisPlant } from './types.js';
import {
  AristonApiError,
  AristonAuthError,
  decodePlantData,
  isLoginResponse,
  isPlantDescriptor,
  isRecord,
} from './types.js';

const API_PATH = '/api/v2';
const APP_ID = 'com.remotethermo.velis';
const REQUEST_TIMEOUT_MS = 30000;

// Ariston NET answers 405 once the token has gone stale
export const SESSION_STALE_STATUS = 405;
const MAX_SESSION_RENEWALS = 1;

type HttpMethod = 'GET' | 'POST';

/**
 * HTTP client for the Ariston NET (Velis) cloud API
 */
export class AristonClient {
  private readonly host: string;
  private readonly requestTimeout: number;
  private readonly log: Logging;

  private currentSession: Session = createSession();

  constructor(config: AristonClientConfig, log: Logging) {
    this.host = (config.host ?? DEFAULT_HOST).replace(/\/+$/, '');
    this.requestTimeout = config.requestTimeout ?? REQUEST_TIMEOUT_MS;
    this.log = log;
  }

  get session(): Session {
    return this.currentSession;
  }

  get isAuthenticated(): boolean {
    return this.currentSession.state === 'authenticated';
  }

  /**
   * Log in and keep the credentials for silent renewal
   */
  async authenticate(username: string, password: string): Promise<void> {
    this.log.debug('[Auth] Logging in to Ariston NET...');

    let response: Response;
    try {
      response = await this.send('POST', '/accounts/login', {
        usr: username,
        pwd: password,
        imp: false,
        notTrack: true,
      });
    } catch (error) {
      this.currentSession = sessionExpired(this.currentSession);
      this.log.warn(`[Auth] Login request error: ${error instanceof Error ? error.message : String(error)}`);
      throw new AristonAuthError('Login failed: connection failed');
    }

    if (response.status !== 200) {
      await this.discard(response);
      this.currentSession = sessionExpired(this.currentSession);
      this.log.warn(`[Auth] Unexpected reply during login: ${response.status}`);
      throw new AristonAuthError(`Login failed: unexpected reply (status ${response.status})`, response.status);
    }

    const body = await this.readJson(response);
    if (body === undefined) {
      this.currentSession = sessionExpired(this.currentSession);
      throw new AristonAuthError('Login failed: unexpected reply (invalid body)', response.status);
    }
    if (!isLoginResponse(body)) {
      this.currentSession = sessionExpired(this.currentSession);
      throw new AristonAuthError('Login failed: unexpected reply (missing token)', response.status);
    }

    const accountId = typeof body.act === 'string' || typeof body.act === 'number' ? String(body.act) : undefined;
    this.currentSession = sessionAuthenticated(this.currentSession, { username, password }, body.token, accountId);
    this.log.info('Successfully authenticated with Ariston NET');
  }

  /**
   * List the plants (water heaters) registered to the account
   */
  async listPlants(): Promise<VelisPlant[]> {
    const response = await this.request('GET', '/velis/plants');

    if (!response.ok) {
      await this.discard(response);
      throw new AristonApiError(`API request failed with status ${response.status}`, response.status);
    }

    const body = await this.readJson(response);
    if (!Array.isArray(body)) {
      throw new AristonApiError('Unexpected plant list payload', response.status);
    }

    const plants: VelisPlant[] = [];
    for (const entry of body) {
      if (!isPlantDescriptor(entry)) {
        this.log.warn('Skipping plant entry without a gateway id');
        continue;
      }
      plants.push({
        gatewayId: entry.gw,
        name: typeof entry.name === 'string' && entry.name ? entry.name : entry.gw,
      });
    }

    this.log.debug(`Found ${plants.length} plant(s)`);
    return plants;
  }

  /**
   * Fetch the status of one plant. Any non-200 reply yields `{ available: false }`
   */
  async getPlantStatus(gatewayId: string): Promise<PlantStatus> {
    const response = await this.request('GET', `/velis/medPlantData/${encodeURIComponent(gatewayId)}`);

    if (response.status !== 200) {
      await this.discard(response);
      this.log.debug(`Plant ${gatewayId} unavailable (status ${response.status})`);
      return { available: false };
    }

    const body = await this.readJson(response);
    if (!isRecord(body)) {
      throw new AristonApiError('Unexpected plant data payload', response.status);
    }

    return { ...decodePlantData(body), available: true };
  }

  async setTemperature(gatewayId: string, temperature: number, eco: boolean): Promise<Response> {
    this.log.info(`Setting ${gatewayId} temperature to ${temperature}°C`);
    return this.request('POST', this.plantPath(gatewayId, 'temperature'), {
      eco,
      new: temperature,
      old: 0.0,
    });
  }

  async setPower(gatewayId: string, on: boolean): Promise<Response> {
    this.log.info(`Switching ${gatewayId} ${on ? 'on' : 'off'}`);
    return this.request('POST', this.plantPath(gatewayId, 'switch'), on);
  }

  async setEco(gatewayId: string, on: boolean): Promise<Response> {
    this.log.info(`Switching ${gatewayId} eco mode ${on ? 'on' : 'off'}`);
    return this.request('POST', this.plantPath(gatewayId, 'switchEco'), on);
  }

  /**
   * The API expects the mode change as a diff between the two mode values
   */
  async setScheduleMode(gatewayId: string, on: boolean): Promise<Response> {
    this.log.info(`Switching ${gatewayId} schedule mode ${on ? 'on' : 'off'}`);
    const data = on
      ? { new: PLANT_MODE.schedule, old: PLANT_MODE.manual }
      : { new: PLANT_MODE.manual, old: PLANT_MODE.schedule };
    return this.request('POST', this.plantPath(gatewayId, 'mode'), data);
  }

  private plantPath(gatewayId: string, action: string): string {
    return `/velis/medPlantData/${encodeURIComponent(gatewayId)}/${action}`;
  }

  /**
   * Authenticated request with at most one session renewal
   */
  private async request(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    for (let renewals = 0; renewals <= MAX_SESSION_RENEWALS; renewals++) {
      if (renewals > 0) {
        await this.renewSession();
      }

      const response = await this.sendAuthenticated(method, path, body);
      if (response.status !== SESSION_STALE_STATUS) {
        return response;
      }

      await this.discard(response);
      this.log.debug(`Received ${SESSION_STALE_STATUS} for ${method} ${path}, session is stale`);
    }

    this.currentSession = sessionFailed(this.currentSession);
    throw new AristonAuthError('Session renewal failed', SESSION_STALE_STATUS);
  }

  /**
   * Parse a JSON body; undefined when the body is not JSON
   */
  private async readJson(response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      this.log.debug(`Response body is not JSON: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  // Release the connection held by a body that is never read
  private async discard(response: Response): Promise<void> {
    await response.body?.cancel();
  }

  private async renewSession(): Promise<void> {
    const { credentials } = this.currentSession;
    this.currentSession = sessionExpired(this.currentSession);

    if (!credentials) {
      this.currentSession = sessionFailed(this.currentSession);
      throw new AristonAuthError('Session expired and no credentials are stored');
    }

    this.log.debug('Re-authenticating with stored credentials...');
    try {
      await this.authenticate(credentials.username, credentials.password);
    } catch (error) {
      this.currentSession = sessionFailed(this.currentSession);
      throw error;
    }
  }

  private async sendAuthenticated(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    try {
      return await this.send(method, path, body);
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new AristonApiError('Request timed out');
        }
        throw new AristonApiError(`Network error: ${error.message}`);
      }
      throw new AristonApiError('Unknown error occurred');
    }
  }

  /**
   * Single HTTP round trip, carrying the token when one is held
   */
  private async send(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    const url = new URL(`${this.host}${API_PATH}${path}`);
    url.searchParams.set('appId', APP_ID);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.currentSession.authToken) {
      headers['ar.authToken'] = this.currentSession.authToken;
    }
    if (method === 'POST') {
      headers['Content-Type'] = 'application/json';
    }

    this.log.debug(`${method} ${url.pathname}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeout);

    try {
      return await fetch(url.toString(), {
        method,
        headers,
        body: method === 'POST' ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
