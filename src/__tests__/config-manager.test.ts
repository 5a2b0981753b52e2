import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import ConfigManager from '../config-manager';
import { CONFIG_FILE_NAME } from '../constants';

let dataDir: string;

function writeConfig(contents: string): void {
  fs.writeFileSync(path.join(dataDir, CONFIG_FILE_NAME), contents, 'utf8');
}

function readConfig(): unknown {
  return JSON.parse(fs.readFileSync(path.join(dataDir, CONFIG_FILE_NAME), 'utf8'));
}

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bev-config-'));
});

afterEach(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

describe('ConfigManager.loadConfig', () => {
  it('writes defaults when no config exists', () => {
    const manager = new ConfigManager(dataDir);
    const config = manager.loadConfig();

    expect(config).toEqual({
      restaurantName: 'My Bar',
      locations: ['Bar', 'Back Bar', 'Storage'],
      distributors: [],
      exportDir: 'exports',
      logLevel: 'info'
    });
    expect(readConfig()).toEqual(config);
  });

  it('migrates snake_case keys and numbered locations', () => {
    writeConfig(
      JSON.stringify({
        restaurant_name: 'Harbor Tavern',
        log_level: 'debug',
        locations: { location_2: 'Cellar', location_1: 'Bar', location_3: '' }
      })
    );
    const config = new ConfigManager(dataDir).loadConfig();

    expect(config.restaurantName).toBe('Harbor Tavern');
    expect(config.logLevel).toBe('debug');
    expect(config.locations).toEqual(['Bar', 'Cellar']);
    expect(config.exportDir).toBe('exports');
    expect(readConfig()).toEqual(config);
  });

  it('falls back per key when a value is invalid', () => {
    writeConfig(JSON.stringify({ logLevel: 'loud', exportDir: 'out' }));
    const config = new ConfigManager(dataDir).loadConfig();
    expect(config.logLevel).toBe('info');
    expect(config.exportDir).toBe('out');
  });

  it('drops unknown keys from the saved file', () => {
    writeConfig(JSON.stringify({ restaurantName: 'Corner Bar', theme: 'dark' }));
    const config = new ConfigManager(dataDir).loadConfig();
    expect(config.restaurantName).toBe('Corner Bar');
    expect(readConfig()).not.toHaveProperty('theme');
  });

  it('returns defaults for unreadable or non-object files', () => {
    writeConfig('{not json');
    expect(new ConfigManager(dataDir).loadConfig().restaurantName).toBe('My Bar');

    writeConfig('[1, 2]');
    expect(new ConfigManager(dataDir).loadConfig().restaurantName).toBe('My Bar');
  });
});

describe('ConfigManager.updateConfig', () => {
  it('merges and persists a valid patch', () => {
    const manager = new ConfigManager(dataDir);
    const updated = manager.updateConfig({ restaurantName: 'The Cellar', distributors: ['Northside Wines'] });

    expect(updated.restaurantName).toBe('The Cellar');
    expect(updated.locations).toEqual(['Bar', 'Back Bar', 'Storage']);
    expect(manager.loadConfig().distributors).toEqual(['Northside Wines']);
  });

  it('ignores undefined values in the patch', () => {
    const manager = new ConfigManager(dataDir);
    manager.updateConfig({ exportDir: 'reports' });
    expect(manager.updateConfig({ exportDir: undefined }).exportDir).toBe('reports');
  });

  it('rejects an invalid patch without saving', () => {
    const manager = new ConfigManager(dataDir);
    const locations = Array.from({ length: 13 }, (_, i) => `Area ${i + 1}`);
    expect(() => manager.updateConfig({ locations })).toThrow(/^Invalid config patch: locations: /);
    expect(manager.loadConfig().locations).toEqual(['Bar', 'Back Bar', 'Storage']);
  });
});
