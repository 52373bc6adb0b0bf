import type { API, Characteristic, Logging, PlatformAccessory, PlatformConfig, Service } from 'homebridge';
import { vi } from 'vitest';

/**
 * Create a mock Homebridge Logging interface
 */
export function createMockLogger(): Logging {
  return {
    prefix: 'TestPlugin',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    success: vi.fn(),
  } as unknown as Logging;
}

// Internal mock characteristic type
interface MockCharacteristicInternal {
  setProps: ReturnType<typeof vi.fn>;
  onGet: ReturnType<typeof vi.fn>;
  onSet: ReturnType<typeof vi.fn>;
  updateValue: ReturnType<typeof vi.fn>;
  value: unknown;
}

/**
 * Create a mock Characteristic with common properties
 */
function createMockCharacteristic(): Characteristic & MockCharacteristicInternal {
  const char: MockCharacteristicInternal = {
    setProps: vi.fn().mockReturnThis(),
    onGet: vi.fn().mockReturnThis(),
    onSet: vi.fn().mockReturnThis(),
    updateValue: vi.fn().mockReturnThis(),
    value: null,
  };
  return char as unknown as Characteristic & MockCharacteristicInternal;
}

/**
 * Mock characteristic constants
 */
const MockCharacteristicConstants = {
  CurrentTemperature: 'CurrentTemperature',
  TargetTemperature: 'TargetTemperature',
  Name: 'Name',
  Manufacturer: 'Manufacturer',
  Model: 'Model',
  SerialNumber: 'SerialNumber',
};

export const MockHeatingCoolingStates = {
  current: { OFF: 0, HEAT: 1, COOL: 2 },
  target: { OFF: 0, HEAT: 1, COOL: 2, AUTO: 3 },
};

export const MockTemperatureDisplayUnits = { CELSIUS: 0, FAHRENHEIT: 1 };

export const MockStatusFault = { NO_FAULT: 0, GENERAL_FAULT: 1 };

export interface MockService {
  setCharacteristic: ReturnType<typeof vi.fn>;
  updateCharacteristic: ReturnType<typeof vi.fn>;
  getCharacteristic: ReturnType<typeof vi.fn>;
  _characteristics: Map<unknown, MockCharacteristicInternal>;
}

/**
 * Create a mock Service. Characteristics are keyed by the type passed in.
 */
function createMockService(): Service & MockService {
  const characteristics = new Map<unknown, MockCharacteristicInternal>();

  const service = {
    setCharacteristic: vi.fn((type: unknown, value: unknown) => {
      const char = characteristics.get(type) || createMockCharacteristic();
      char.value = value;
      characteristics.set(type, char);
      return service;
    }),
    updateCharacteristic: vi.fn((type: unknown, value: unknown) => {
      const char = characteristics.get(type) || createMockCharacteristic();
      char.value = value;
      characteristics.set(type, char);
      return service;
    }),
    getCharacteristic: vi.fn((type: unknown) => {
      const existing = characteristics.get(type);
      if (existing) {
        return existing;
      }
      const char = createMockCharacteristic();
      characteristics.set(type, char);
      return char;
    }),
    displayName: 'MockService',
    UUID: 'mock-service-uuid',
    _characteristics: characteristics,
  };

  return service as unknown as Service & MockService;
}

function serviceKey(serviceType: string | Service): string {
  return typeof serviceType === 'string' ? serviceType : (serviceType as unknown as { name: string }).name;
}

/**
 * Mock PlatformAccessory class for use with 'new' keyword
 */
export class MockPlatformAccessory {
  UUID: string;
  displayName: string;
  context: Record<string, unknown> = {};
  readonly _services = new Map<string, Service & MockService>();

  constructor(name: string, uuid: string) {
    this.displayName = name;
    this.UUID = uuid;
    this._services.set('AccessoryInformation', createMockService());
  }

  getService = vi.fn((serviceType: string | Service): (Service & MockService) | undefined => {
    return this._services.get(serviceKey(serviceType));
  });

  addService = vi.fn((serviceType: string | Service): Service & MockService => {
    const service = createMockService();
    this._services.set(serviceKey(serviceType), service);
    return service;
  });
}

/**
 * Create a mock PlatformAccessory
 */
export function createMockAccessory(displayName = 'Mock Accessory', uuid?: string): PlatformAccessory & MockPlatformAccessory {
  const accessory = new MockPlatformAccessory(
    displayName,
    uuid ?? `mock-uuid-${displayName.replace(/\s/g, '-').toLowerCase()}`,
  );
  return accessory as unknown as PlatformAccessory & MockPlatformAccessory;
}

/**
 * Create mock Service and Characteristic types for the API
 */
export function createMockServiceTypes(): typeof Service {
  return {
    Thermostat: { name: 'Thermostat', UUID: 'thermostat-uuid' },
    AccessoryInformation: { name: 'AccessoryInformation', UUID: 'info-uuid' },
  } as unknown as typeof Service;
}

export function createMockCharacteristicTypes(): typeof Characteristic {
  return {
    ...MockCharacteristicConstants,
    CurrentHeatingCoolingState: MockHeatingCoolingStates.current,
    TargetHeatingCoolingState: MockHeatingCoolingStates.target,
    TemperatureDisplayUnits: MockTemperatureDisplayUnits,
    StatusFault: MockStatusFault,
  } as unknown as typeof Characteristic;
}

interface MockAPI {
  on: ReturnType<typeof vi.fn>;
  registerPlatformAccessories: ReturnType<typeof vi.fn>;
  unregisterPlatformAccessories: ReturnType<typeof vi.fn>;
  _accessories: Map<string, PlatformAccessory>;
}

/**
 * Create a mock Homebridge API
 */
export function createMockAPI(): API & MockAPI {
  const accessories = new Map<string, PlatformAccessory>();

  return {
    hap: {
      Service: createMockServiceTypes(),
      Characteristic: createMockCharacteristicTypes(),
      uuid: {
        generate: vi.fn((input: string) => `uuid-${input}`),
      },
    },
    on: vi.fn(),
    registerPlatformAccessories: vi.fn((pluginName: string, platformName: string, accs: PlatformAccessory[]) => {
      for (const acc of accs) {
        accessories.set(acc.UUID, acc);
      }
    }),
    unregisterPlatformAccessories: vi.fn((pluginName: string, platformName: string, accs: PlatformAccessory[]) => {
      for (const acc of accs) {
        accessories.delete(acc.UUID);
      }
    }),
    platformAccessory: MockPlatformAccessory,
    _accessories: accessories,
  } as unknown as API & MockAPI;
}

/**
 * Create a mock platform config
 */
export function createMockConfig(overrides: Partial<PlatformConfig> = {}): PlatformConfig {
  return {
    platform: 'AristonVelis',
    name: 'Ariston Velis',
    username: 'test@example.com',
    password: 'test-password',
    pollingInterval: 30,
    ...overrides,
  };
}

/**
 * Create mock fetch response
 */
export function createMockResponse(options: {
  status?: number;
  ok?: boolean;
  json?: () => Promise<unknown>;
  text?: () => Promise<string>;
}): Response {
  const status = options.status ?? 200;
  return {
    status,
    ok: options.ok ?? (status >= 200 && status < 300),
    headers: new Headers(),
    json: options.json ?? (() => Promise.resolve({})),
    text: options.text ?? (() => Promise.resolve('')),
  } as unknown as Response;
}

/**
 * Successful login reply
 */
export function createMockLoginResponse(token = 'test-token', act: unknown = 'test-account'): Response {
  return createMockResponse({
    status: 200,
    json: async () => ({ token, act }),
  });
}

/**
 * Sample plant list
 */
export function createMockPlantsResponse(): object[] {
  return [
    { gw: 'GW-0001', name: 'Bathroom Velis', model: 'VLS' },
    { gw: 'GW-0002', name: 'Kitchen Velis' },
  ];
}

/**
 * Sample plant status
 */
export function createMockPlantData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    gw: 'GW-0001',
    temp: 45,
    reqTemp: 60,
    on: true,
    eco: false,
    mode: 1,
    ...overrides,
  };
}
