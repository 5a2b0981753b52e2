import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_LOCATIONS } from './constants';
import Logger, { getErrorMessage } from './logger';
import type { AppConfig, AppConfigPatch } from './types';
import { appConfigSchema, validateConfigPatch } from './validators';

/** Map snake_case keys from older client config files to their current names */
const LEGACY_KEY_MAP: Record<string, keyof AppConfig> = {
  restaurant_name: 'restaurantName',
  export_dir: 'exportDir',
  log_level: 'logLevel'
};

/**
 * Older configs stored locations as { location_1: "Bar", location_2: "Back Bar", ... }.
 * Convert to the ordered array form, skipping blank slots.
 */
function migrateLocations(locations: Record<string, unknown>): string[] {
  return Object.keys(locations)
    .sort()
    .map((key) => locations[key])
    .filter((name): name is string => typeof name === 'string' && name.trim() !== '');
}

/** Migrate legacy config formats in-place. Returns true if any migration was applied. */
function migrateLegacyConfig(disk: Record<string, unknown>): boolean {
  let migrated = false;

  for (const [oldKey, newKey] of Object.entries(LEGACY_KEY_MAP)) {
    if (oldKey in disk && !(newKey in disk)) {
      disk[newKey] = disk[oldKey];
      delete disk[oldKey];
      migrated = true;
    }
  }

  const locations = disk.locations;
  if (typeof locations === 'object' && locations !== null && !Array.isArray(locations)) {
    disk.locations = migrateLocations({ ...locations });
    migrated = true;
  }

  return migrated;
}

const CONFIG_KEYS: ReadonlyArray<keyof AppConfig> = ['restaurantName', 'locations', 'distributors', 'exportDir', 'logLevel'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ConfigManager {
  private configPath: string;

  constructor(dataDir: string) {
    this.configPath = path.join(dataDir, CONFIG_FILE_NAME);
  }

  getDefaults(): AppConfig {
    return {
      restaurantName: 'My Bar',
      locations: [...DEFAULT_LOCATIONS],
      distributors: [],
      exportDir: 'exports',
      logLevel: 'info'
    };
  }

  private readDisk(): unknown {
    if (!fs.existsSync(this.configPath)) return null;
    return JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
  }

  loadConfig(): AppConfig {
    const defaults = this.getDefaults();
    try {
      const disk = this.readDisk();
      if (disk === null) {
        this.saveConfig(defaults);
        return defaults;
      }
      if (!isRecord(disk)) {
        Logger.warn(`${CONFIG_FILE_NAME} is not an object; restoring defaults`);
        this.saveConfig(defaults);
        return defaults;
      }

      let healed = migrateLegacyConfig(disk);
      const result: AppConfig = { ...defaults };
      const shape = appConfigSchema.shape;

      // Pick known keys whose values still validate; anything else falls back to the default
      for (const key of CONFIG_KEYS) {
        if (!(key in disk)) continue;
        const parsed = shape[key].safeParse(disk[key]);
        if (parsed.success) {
          Object.assign(result, { [key]: parsed.data });
        } else {
          Logger.warn(`Config key "${key}" is invalid; using default`);
          healed = true;
        }
      }

      // Detect unknown keys
      for (const key of Object.keys(disk)) {
        if (!Object.hasOwn(defaults, key)) healed = true;
      }

      if (healed) this.saveConfig(result);
      return result;
    } catch (error) {
      Logger.error('Error loading config:', error);
      this.saveConfig(defaults);
      return defaults;
    }
  }

  saveConfig(config: AppConfig): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      const tmp = `${this.configPath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(config, null, 2), 'utf8');
      fs.renameSync(tmp, this.configPath);
    } catch (err) {
      Logger.warn(`Could not save ${CONFIG_FILE_NAME}:`, getErrorMessage(err));
    }
  }

  /** Merge a validated patch into the stored config. Invalid patches are rejected with the zod issues. */
  updateConfig(patch: AppConfigPatch): AppConfig {
    const validation = validateConfigPatch(patch);
    if (!validation.valid) {
      throw new Error(`Invalid config patch: ${validation.issues.join('; ')}`);
    }
    const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
    const updated: AppConfig = { ...this.loadConfig(), ...defined };
    this.saveConfig(updated);
    return updated;
  }
}

export default ConfigManager;
