/**
 * Ariston NET (Velis) API types
 * Based on https://www.ariston-net.remotethermo.com/api/v2/velis/...
 */

/**
 * Raw login reply: { token, act }
 */
export interface LoginResponse {
  token: string;
  act?: unknown;  // Account id
}

/**
 * Raw entry of GET /velis/plants
 */
export interface VelisPlantDescriptor {
  gw: string;
  name?: string;
  [key: string]: unknown;
}

/**
 * One controllable water heater
 */
export interface VelisPlant {
  gatewayId: string;
  name: string;
}

/**
 * Decoded body of GET /velis/medPlantData/{gw}
 */
export interface VelisPlantData {
  temp?: number;     // Current water temperature
  reqTemp?: number;  // Requested temperature
  on?: boolean;
  eco?: boolean;
  mode?: number;     // 5 = schedule, 1 = manual
  [key: string]: unknown;
}

/**
 * Plant status as seen by callers. A non-200 reply degrades to `{ available: false }`
 */
export type PlantStatus = (VelisPlantData & { available: true }) | { available: false };

/**
 * API client configuration
 */
export interface AristonClientConfig {
  host?: string;            // Default: https://www.ariston-net.remotethermo.com
  requestTimeout?: number;  // Milliseconds, default 30000
}

/**
 * Custom error class for Ariston API errors
 */
export class AristonApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public isAuthError: boolean = false,
  ) {
    super(message);
    this.name = 'AristonApiError';
  }
}

/**
 * Login rejected, login host unreachable, or session renewal failed
 */
export class AristonAuthError extends AristonApiError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode, true);
    this.name = 'AristonAuthError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isLoginResponse(value: unknown): value is LoginResponse {
  return isRecord(value) && typeof value.token === 'string' && value.token.length > 0;
}

export function isPlantDescriptor(value: unknown): value is VelisPlantDescriptor {
  return isRecord(value) && typeof value.gw === 'string' && value.gw.length > 0;
}

const PLANT_DATA_FIELDS: Partial<Record<string, 'number' | 'boolean'>> = {
  temp: 'number',
  reqTemp: 'number',
  on: 'boolean',
  eco: 'boolean',
  mode: 'number',
};

/**
 * Copy a status body, dropping known fields whose type does not match
 */
export function decodePlantData(body: Record<string, unknown>): VelisPlantData {
  const data: VelisPlantData = {};
  for (const [key, value] of Object.entries(body)) {
    const expected = PLANT_DATA_FIELDS[key];
    if (expected !== undefined && typeof value !== expected) {
      continue;
    }
    data[key] = value;
  }
  return data;
}
