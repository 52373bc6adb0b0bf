import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { AristonClient } from './api/client.js';
import { AristonApiError } from './api/types.js';
import type { VelisPlant } from './api/types.js';
import type { OperationMode, PlantCommand } from './operationMode.js';
import { planModeChange, planTemperatureChange } from './operationMode.js';
import { DEFAULT_POLLING_INTERVAL, MIN_POLLING_INTERVAL, PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { WaterHeaterAccessory } from './waterHeaterAccessory.js';

/**
 * Plugin configuration, after validation
 */
interface AristonVelisConfig {
  username: string;
  password: string;
  host?: string;
  pollingInterval: number;
}

/**
 * Ariston Velis Platform
 * Main platform class that manages one water heater accessory per plant
 */
export class AristonVelisPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Cached accessories from disk
  private readonly accessories: Map<string, PlatformAccessory> = new Map();

  // Active accessory handlers, keyed by gateway id
  private readonly waterHeaters: Map<string, WaterHeaterAccessory> = new Map();

  // API client (initialized after config validation)
  private apiClient?: AristonClient;
  private settings?: AristonVelisConfig;

  private discovered = false;
  private discovering = false;

  // Polling timer
  private pollingTimer?: NodeJS.Timeout;

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    this.log.debug('Initializing Ariston Velis platform');

    // Wait for Homebridge to finish loading cached accessories
    this.api.on('didFinishLaunching', () => {
      this.log.debug('didFinishLaunching callback');
      void this.setupPlatform();
    });

    this.api.on('shutdown', () => {
      this.shutdown();
    });
  }

  /**
   * Called by Homebridge to restore cached accessories
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info('Restoring cached accessory:', accessory.displayName);
    this.accessories.set(accessory.UUID, accessory);
  }

  /**
   * Main setup after Homebridge is ready
   */
  async setupPlatform(): Promise<void> {
    const settings = this.parseConfig();
    if (!settings) {
      return;
    }
    this.settings = settings;

    // Initialize API client
    this.apiClient = new AristonClient({ host: settings.host }, this.log);

    // Start polling
    this.startPolling(settings.pollingInterval);

    // Initial fetch discovers the plants
    await this.pollApi();
  }

  private parseConfig(): AristonVelisConfig | undefined {
    const { username, password, host, pollingInterval } = this.config;

    if (typeof username !== 'string' || !username) {
      this.log.error('Missing required config: username. Please provide your Ariston NET account email in the plugin settings.');
      return undefined;
    }

    if (typeof password !== 'string' || !password) {
      this.log.error('Missing required config: password. Please provide your Ariston NET password in the plugin settings.');
      return undefined;
    }

    return {
      username,
      password,
      host: typeof host === 'string' && host ? host : undefined,
      pollingInterval: Math.max(
        typeof pollingInterval === 'number' ? pollingInterval : DEFAULT_POLLING_INTERVAL,
        MIN_POLLING_INTERVAL,
      ),
    };
  }

  /**
   * Log in, list plants and register one accessory per plant
   */
  private async discoverPlants(): Promise<boolean> {
    if (!this.apiClient || !this.settings) {
      return false;
    }

    let plants: VelisPlant[];
    try {
      await this.apiClient.authenticate(this.settings.username, this.settings.password);
      plants = await this.apiClient.listPlants();
    } catch (error) {
      this.logApiError('Plant discovery failed', error);
      return false;
    }

    const registeredUUIDs: string[] = [];
    for (const plant of plants) {
      registeredUUIDs.push(this.registerPlant(plant));
    }
    this.cleanupObsoleteAccessories(registeredUUIDs);

    this.discovered = true;
    this.log.info(`Discovered ${plants.length} water heater(s)`);
    return true;
  }

  /**
   * Register or restore the accessory for one plant
   */
  private registerPlant(plant: VelisPlant): string {
    // Generate unique UUID from the gateway id
    const uuid = this.api.hap.uuid.generate(`ariston-velis-${plant.gatewayId}`);

    let accessory = this.accessories.get(uuid);

    if (accessory) {
      this.log.info('Restoring water heater from cache:', plant.name);
      accessory.context.plant = plant;
    } else {
      this.log.info('Adding new water heater:', plant.name);
      accessory = new this.api.platformAccessory(plant.name, uuid);
      accessory.context.plant = plant;
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      this.accessories.set(uuid, accessory);
    }

    this.waterHeaters.set(plant.gatewayId, new WaterHeaterAccessory(this, accessory, plant));
    return uuid;
  }

  /**
   * Remove any cached accessories whose plant is gone
   */
  private cleanupObsoleteAccessories(registeredUUIDs: string[]): void {
    for (const [uuid, accessory] of this.accessories) {
      if (!registeredUUIDs.includes(uuid)) {
        this.log.info('Removing obsolete accessory:', accessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.delete(uuid);
      }
    }
  }

  /**
   * Start the polling timer
   */
  private startPolling(intervalSeconds: number): void {
    this.log.info(`Starting API polling every ${intervalSeconds} seconds`);

    this.pollingTimer = setInterval(
      () => void this.pollApi(),
      intervalSeconds * 1000,
    );
  }

  /**
   * Stop polling when Homebridge shuts down
   */
  shutdown(): void {
    if (this.pollingTimer) {
      clearInterval(this.pollingTimer);
      this.pollingTimer = undefined;
    }
  }

  /**
   * Fetch every plant's status and update its accessory
   */
  async pollApi(): Promise<void> {
    if (!this.apiClient) {
      return;
    }

    // Discovery is retried on every tick until a login succeeds
    if (!this.discovered) {
      if (this.discovering) {
        this.log.debug('Plant discovery still in progress, skipping poll');
        return;
      }

      this.discovering = true;
      try {
        if (!(await this.discoverPlants())) {
          return;
        }
      } finally {
        this.discovering = false;
      }
    }

    const client = this.apiClient;
    await Promise.all(
      Array.from(this.waterHeaters.values()).map(async (handler) => {
        try {
          const status = await client.getPlantStatus(handler.gatewayId);
          if (!status.available) {
            this.log.warn(`Water heater ${handler.plant.name} is unavailable`);
            handler.setUnavailable();
            return;
          }

          handler.clearFault();
          handler.updateStatus(status);
        } catch (error) {
          this.logApiError(`Failed to update ${handler.plant.name}`, error);
          handler.setUnavailable();
        }
      }),
    );
  }

  /**
   * Set a new target temperature via API
   * @returns the resulting operation mode, or undefined when the API call failed
   */
  async setTargetTemperature(
    gatewayId: string,
    temperature: number,
    currentMode: OperationMode,
    eco: boolean,
  ): Promise<OperationMode | undefined> {
    const { commands, mode } = planTemperatureChange(currentMode, temperature, eco);
    const ok = await this.runCommands(gatewayId, commands, 'Failed to set target temperature');
    return ok ? mode : undefined;
  }

  /**
   * Switch the operation mode via API
   */
  async setOperationMode(gatewayId: string, currentMode: OperationMode, targetMode: OperationMode): Promise<boolean> {
    this.log.info(`Setting ${gatewayId} operation mode from ${currentMode} to ${targetMode}`);
    return this.runCommands(gatewayId, planModeChange(currentMode, targetMode), 'Failed to set operation mode');
  }

  private async runCommands(gatewayId: string, commands: PlantCommand[], failure: string): Promise<boolean> {
    if (!this.apiClient) {
      this.log.error(`${failure} - API client not initialized`);
      return false;
    }

    try {
      for (const command of commands) {
        await this.runCommand(this.apiClient, gatewayId, command);
      }
      return true;
    } catch (error) {
      this.logApiError(failure, error);
      return false;
    }
  }

  private async runCommand(client: AristonClient, gatewayId: string, command: PlantCommand): Promise<void> {
    switch (command.kind) {
      case 'power':
        await client.setPower(gatewayId, command.on);
        break;
      case 'eco':
        await client.setEco(gatewayId, command.on);
        break;
      case 'schedule':
        await client.setScheduleMode(gatewayId, command.on);
        break;
      case 'temperature':
        await client.setTemperature(gatewayId, command.temperature, command.eco);
        break;
    }
  }

  private logApiError(context: string, error: unknown): void {
    if (error instanceof AristonApiError) {
      if (error.isAuthError) {
        this.log.error(`${context}: ${error.message} - please check your Ariston NET credentials`);
      } else {
        this.log.error(`${context}: ${error.message}`);
      }
    } else {
      this.log.error(`${context}: unexpected error`, error);
    }
  }
}
