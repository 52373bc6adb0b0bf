/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'AristonVelis';

/**
 * This must match the name of your plugin as defined in the package.json `name` property
 */
export const PLUGIN_NAME = 'homebridge-ariston-velis';

/**
 * Ariston NET cloud host
 */
export const DEFAULT_HOST = 'https://www.ariston-net.remotethermo.com';

/**
 * Default polling interval in seconds
 */
export const DEFAULT_POLLING_INTERVAL = 30;

/**
 * Minimum allowed polling interval in seconds
 */
export const MIN_POLLING_INTERVAL = 5;

/**
 * Target temperature range accepted by Velis heaters (°C, whole degrees)
 */
export const TARGET_TEMPERATURE = {
  min: 40,
  max: 80,
  step: 1,
} as const;

/**
 * Plant `mode` values: 5 follows the timed program, 1 is manual control
 */
export const PLANT_MODE = {
  manual: 1,
  schedule: 5,
} as const;
