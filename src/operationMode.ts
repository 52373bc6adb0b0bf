import type { VelisPlantData } from './api/types.js';
import { PLANT_MODE } from './settings.js';

export type OperationMode = 'off' | 'manual' | 'schedule' | 'eco';

/**
 * One call against the Ariston API, in the order it has to be issued
 */
export type PlantCommand =
  | { kind: 'power'; on: boolean }
  | { kind: 'eco'; on: boolean }
  | { kind: 'schedule'; on: boolean }
  | { kind: 'temperature'; temperature: number; eco: boolean };

/**
 * Derive the operation mode from a plant status.
 * Eco wins over schedule when both are reported.
 */
export function operationModeFromStatus(data: VelisPlantData): OperationMode {
  if (!data.on) {
    return 'off';
  }
  if (data.eco) {
    return 'eco';
  }
  if (data.mode === PLANT_MODE.schedule) {
    return 'schedule';
  }
  return 'manual';
}

/**
 * Commands to move a plant from one operation mode to another
 */
export function planModeChange(current: OperationMode, target: OperationMode): PlantCommand[] {
  if (current === target) {
    return [];
  }

  const commands: PlantCommand[] = [];
  if (current === 'off') {
    commands.push({ kind: 'power', on: true });
  }

  switch (target) {
    case 'eco':
      commands.push({ kind: 'eco', on: true });
      break;
    case 'schedule':
      commands.push({ kind: 'schedule', on: true });
      break;
    case 'manual':
      commands.push({ kind: 'schedule', on: false });
      break;
    case 'off':
      commands.push({ kind: 'power', on: false });
      break;
  }

  return commands;
}

/**
 * Commands to set a new target temperature. A plant that is off is switched on first
 * and ends up in manual mode.
 */
export function planTemperatureChange(
  current: OperationMode,
  temperature: number,
  eco: boolean,
): { commands: PlantCommand[]; mode: OperationMode } {
  const commands: PlantCommand[] = [];
  let mode = current;

  if (current === 'off') {
    commands.push({ kind: 'power', on: true });
    mode = 'manual';
  }
  commands.push({ kind: 'temperature', temperature, eco });

  return { commands, mode };
}
