import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import type { VelisPlant, VelisPlantData } from './api/types.js';
import type { OperationMode } from './operationMode.js';
import { operationModeFromStatus } from './operationMode.js';
import type { AristonVelisPlatform } from './platform.js';
import { TARGET_TEMPERATURE } from './settings.js';

/**
 * Water Heater Accessory
 * Exposes a HomeKit Thermostat service for one Velis plant.
 * Uses TargetHeatingCoolingState: OFF=Off, HEAT=Manual, AUTO=Schedule, COOL=Eco
 */
export class WaterHeaterAccessory {
  private readonly service: Service;
  public readonly accessory: PlatformAccessory;
  public readonly plant: VelisPlant;

  // Current state
  private currentTemperature = 0;
  private targetTemperature: number = TARGET_TEMPERATURE.min;
  private mode: OperationMode = 'off';
  private eco = false;

  private readonly modeToHomeKit: Record<OperationMode, number>;

  constructor(
    private readonly platform: AristonVelisPlatform,
    accessory: PlatformAccessory,
    plant: VelisPlant,
  ) {
    this.accessory = accessory;
    this.plant = plant;

    const { OFF, HEAT, COOL, AUTO } = this.platform.Characteristic.TargetHeatingCoolingState;
    this.modeToHomeKit = {
      off: OFF,
      manual: HEAT,
      schedule: AUTO,
      eco: COOL,
    };

    // Set accessory information
    this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?.setCharacteristic(this.platform.Characteristic.Manufacturer, 'Ariston')
      .setCharacteristic(this.platform.Characteristic.Model, 'Velis')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, plant.gatewayId);

    // Get or create Thermostat service
    this.service = this.accessory.getService(this.platform.Service.Thermostat)
      || this.accessory.addService(this.platform.Service.Thermostat);

    this.service.setCharacteristic(this.platform.Characteristic.Name, plant.name);

    this.service.getCharacteristic(this.platform.Characteristic.CurrentTemperature)
      .setProps({
        minValue: 0,
        maxValue: 100,
      });

    this.service.getCharacteristic(this.platform.Characteristic.TargetTemperature)
      .setProps({
        minValue: TARGET_TEMPERATURE.min,
        maxValue: TARGET_TEMPERATURE.max,
        minStep: TARGET_TEMPERATURE.step,
      })
      .onGet(this.getTargetTemperature.bind(this))
      .onSet(this.setTargetTemperature.bind(this));

    // Water heaters only heat
    this.service.getCharacteristic(this.platform.Characteristic.CurrentHeatingCoolingState)
      .setProps({
        validValues: [
          this.platform.Characteristic.CurrentHeatingCoolingState.OFF,
          this.platform.Characteristic.CurrentHeatingCoolingState.HEAT,
        ],
      });

    this.service.getCharacteristic(this.platform.Characteristic.TargetHeatingCoolingState)
      .setProps({
        validValues: [OFF, HEAT, COOL, AUTO],
      })
      .onGet(this.getTargetState.bind(this))
      .onSet(this.setTargetState.bind(this));

    this.service.getCharacteristic(this.platform.Characteristic.TemperatureDisplayUnits)
      .setProps({
        validValues: [this.platform.Characteristic.TemperatureDisplayUnits.CELSIUS],
      });
    this.service.updateCharacteristic(
      this.platform.Characteristic.TemperatureDisplayUnits,
      this.platform.Characteristic.TemperatureDisplayUnits.CELSIUS,
    );

    this.platform.log.debug(`Initialized water heater: ${plant.name} (${plant.gatewayId})`);
  }

  get gatewayId(): string {
    return this.plant.gatewayId;
  }

  get operationMode(): OperationMode {
    return this.mode;
  }

  /**
   * Apply a plant status fetched from the API
   */
  updateStatus(data: VelisPlantData): void {
    if (data.temp !== undefined) {
      this.currentTemperature = data.temp;
      this.service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, data.temp);
    }

    if (data.reqTemp !== undefined) {
      this.targetTemperature = data.reqTemp;
      this.service.updateCharacteristic(this.platform.Characteristic.TargetTemperature, data.reqTemp);
    }

    this.eco = data.eco ?? false;
    this.updateMode(operationModeFromStatus(data));

    this.platform.log.debug(
      `${this.plant.name}: ${this.currentTemperature}°C (target ${this.targetTemperature}°C), mode ${this.mode}`,
    );
  }

  private updateMode(mode: OperationMode): void {
    this.mode = mode;
    this.service.updateCharacteristic(
      this.platform.Characteristic.TargetHeatingCoolingState,
      this.modeToHomeKit[mode],
    );
    this.service.updateCharacteristic(
      this.platform.Characteristic.CurrentHeatingCoolingState,
      mode === 'off'
        ? this.platform.Characteristic.CurrentHeatingCoolingState.OFF
        : this.platform.Characteristic.CurrentHeatingCoolingState.HEAT,
    );
  }

  /**
   * Get target temperature for HomeKit
   */
  private async getTargetTemperature(): Promise<CharacteristicValue> {
    return this.targetTemperature;
  }

  /**
   * Set target temperature from HomeKit
   */
  private async setTargetTemperature(value: CharacteristicValue): Promise<void> {
    const temperature = Number(value);
    if (Number.isNaN(temperature)) {
      this.platform.log.warn(`Ignoring invalid target temperature: ${String(value)}`);
      return;
    }

    const mode = await this.platform.setTargetTemperature(this.plant.gatewayId, temperature, this.mode, this.eco);
    if (mode === undefined) {
      this.setUnavailable();
      return;
    }

    this.targetTemperature = temperature;
    this.updateMode(mode);
  }

  /**
   * Get target state for HomeKit
   */
  private async getTargetState(): Promise<CharacteristicValue> {
    return this.modeToHomeKit[this.mode];
  }

  /**
   * Set target state from HomeKit
   */
  private async setTargetState(value: CharacteristicValue): Promise<void> {
    const target = this.modeFromHomeKit(value);
    if (!target) {
      this.platform.log.warn(`Unknown HomeKit state: ${String(value)}`);
      return;
    }

    if (target === this.mode) {
      return;
    }

    const ok = await this.platform.setOperationMode(this.plant.gatewayId, this.mode, target);
    if (!ok) {
      this.setUnavailable();
      return;
    }

    this.updateMode(target);
  }

  private modeFromHomeKit(value: CharacteristicValue): OperationMode | undefined {
    for (const [mode, homeKitState] of Object.entries(this.modeToHomeKit)) {
      if (homeKitState === value && isOperationMode(mode)) {
        return mode;
      }
    }
    return undefined;
  }

  /**
   * Mark as unavailable
   */
  setUnavailable(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.GENERAL_FAULT,
    );
  }

  /**
   * Clear fault status
   */
  clearFault(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.NO_FAULT,
    );
  }
}

function isOperationMode(value: string): value is OperationMode {
  return value === 'off' || value === 'manual' || value === 'schedule' || value === 'eco';
}
