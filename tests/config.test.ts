import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, getConfig, loadConfig } from '../src/config.js';
import { OdtErrorCode } from '../src/tools/odt/errors.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('config', () => {
    let workDir: string;
    let configPath: string;

    beforeEach(async () => {
        workDir = await makeTempDir();
        configPath = path.join(workDir, 'odt-meta.config.json');
    });

    afterEach(async () => {
        await loadConfig(path.join(workDir, 'absent.json'));
        await removeDir(workDir);
    });

    it('should fall back to defaults when the file is missing', async () => {
        const config = await loadConfig(configPath);

        expect(config).toEqual({
            bufferSize: 1024,
            stagingRoot: os.tmpdir(),
            keepStaging: false,
            logLevel: 'info',
        });
        expect(getConfig()).toBe(DEFAULT_CONFIG);
    });

    it('should merge file values over defaults and expand ~', async () => {
        await fs.writeFile(configPath, JSON.stringify({ bufferSize: 4096, stagingRoot: '~/odt-staging' }));

        const config = await loadConfig(configPath);

        expect(config.bufferSize).toBe(4096);
        expect(config.stagingRoot).toBe(`${os.homedir()}/odt-staging`);
        expect(config.keepStaging).toBe(false);
        expect(getConfig()).toEqual(config);
    });

    it('should reject invalid JSON', async () => {
        await fs.writeFile(configPath, '{ bufferSize: ');

        await expect(loadConfig(configPath)).rejects.toMatchObject({ code: OdtErrorCode.CONFIG_ERROR });
    });

    it('should reject out-of-range values', async () => {
        await fs.writeFile(configPath, JSON.stringify({ bufferSize: 0 }));

        await expect(loadConfig(configPath)).rejects.toMatchObject({
            code: OdtErrorCode.CONFIG_ERROR,
            message: 'Invalid config: bufferSize: Number must be greater than 0',
        });
    });

    it('should reject unknown keys', async () => {
        await fs.writeFile(configPath, JSON.stringify({ colour: 'blue' }));

        await expect(loadConfig(configPath)).rejects.toMatchObject({
            message: "Invalid config: (root): Unrecognized key(s) in object: 'colour'",
        });
    });
});
