// tests/config.test.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from '../src/config';
import { ErrorCode } from '../src/types';

describe('config', () => {
  describe('parseConfig', () => {
    test('should fill in defaults', () => {
      expect(DEFAULT_CONFIG).toMatchObject({
        parts: 3,
        startLayer: 0,
        breakRetract: 3,
        breakHop: 10,
        presentY: 220,
        maxZ: 250,
        primeMode: 'air',
        resumeNozzleTemp: 'captured',
        continuationFeedRate: 35,
        overridePolicy: 'reject'
      });
      expect(DEFAULT_CONFIG.maxLayersPerPart).toBeUndefined();
    });

    test('should reject out of range values with the offending key', () => {
      expect(() => parseConfig({ parts: 0 })).toThrow(
        expect.objectContaining({
          code: ErrorCode.InvalidConfig,
          details: { issues: [expect.stringMatching(/^parts: /)] }
        })
      );
    });

    test('should reject unknown keys', () => {
      expect(() => parseConfig({ part: 2 })).toThrow(expect.objectContaining({ code: ErrorCode.InvalidConfig }));
    });

    test('should reject an unknown prime mode', () => {
      expect(() => parseConfig({ primeMode: 'nozzle' })).toThrow(/^Invalid configuration: primeMode: /);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gcode-parts-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    const writeConfig = (text: string) => {
      const file = path.join(dir, 'split.json');
      fs.writeFileSync(file, text);
      return file;
    };

    test('should use defaults without a file', async () => {
      await expect(loadConfig()).resolves.toEqual(DEFAULT_CONFIG);
    });

    test('should let defined overrides win over the file', async () => {
      const file = writeConfig(JSON.stringify({ parts: 4, iron: true, breakHop: 5 }));

      const config = await loadConfig(file, { parts: 6, breakHop: undefined });

      expect(config.parts).toBe(6);
      expect(config.iron).toBe(true);
      expect(config.breakHop).toBe(5);
    });

    test('should reject a file that is not JSON', async () => {
      const file = writeConfig('parts = 4');

      await expect(loadConfig(file)).rejects.toMatchObject({ code: ErrorCode.InvalidConfig });
    });

    test('should reject a file that does not hold an object', async () => {
      const file = writeConfig('[1, 2]');

      await expect(loadConfig(file)).rejects.toThrow(`Configuration file ${file} must hold a JSON object`);
    });
  });
});
