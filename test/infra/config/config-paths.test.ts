import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getConfigDir, getRuntimeConfigPath } from '../../../src/infra/config/config-paths.js';

function makeTempHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'medassist-config-paths-'));
}

describe('config-paths', () => {
  test('uses XDG_CONFIG_HOME when no override is set', () => {
    const tempHome = makeTempHome();

    const configDir = getConfigDir({ XDG_CONFIG_HOME: path.join(tempHome, 'xdg') });

    expect(configDir).toBe(path.join(tempHome, 'xdg', 'medassist'));
  });

  test('respects explicit config dir override and creates it', () => {
    const tempHome = makeTempHome();
    const overrideDir = path.join(tempHome, 'custom-config');

    const configDir = getConfigDir({ MEDASSIST_CONFIG_DIR: overrideDir, XDG_CONFIG_HOME: tempHome });

    expect(configDir).toBe(overrideDir);
    expect(fs.existsSync(overrideDir)).toBe(true);
  });

  test('places the runtime config file in the config dir', () => {
    const tempHome = makeTempHome();

    expect(getRuntimeConfigPath({ MEDASSIST_CONFIG_DIR: tempHome })).toBe(path.join(tempHome, 'medassist.json'));
  });
});
