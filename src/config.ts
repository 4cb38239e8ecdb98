import path from 'path';
import process from 'process';
import os from 'os';
import fs from 'fs/promises';
import { z } from 'zod';
import { OdtError, OdtErrorCode, errorMessage } from './tools/odt/errors.js';
import { DEFAULT_BUFFER_SIZE } from './tools/odt/constants.js';

export const CONFIG_FILE = path.join(process.cwd(), 'odt-meta.config.json');

export const ConfigSchema = z.object({
    bufferSize: z.number().int().positive().default(DEFAULT_BUFFER_SIZE),
    stagingRoot: z.string().min(1).default(os.tmpdir()),
    keepStaging: z.boolean().default(false),
    logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
}).strict();

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

let currentConfig: Config = DEFAULT_CONFIG;

function expandHome(dir: string): string {
    if (dir.startsWith('~')) {
        return dir.replace('~', os.homedir());
    }
    return dir;
}

/**
 * Load configuration from disk.
 * A missing file means defaults; an unreadable or invalid one is an error.
 */
export async function loadConfig(configPath: string = CONFIG_FILE): Promise<Config> {
    let raw: string;
    try {
        raw = await fs.readFile(configPath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            currentConfig = DEFAULT_CONFIG;
            return currentConfig;
        }
        throw new OdtError(`Cannot read config file: ${errorMessage(error)}`, OdtErrorCode.CONFIG_ERROR, { configPath });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new OdtError(`Config file is not valid JSON: ${errorMessage(error)}`, OdtErrorCode.CONFIG_ERROR, { configPath });
    }

    const parsed = ConfigSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new OdtError(`Invalid config: ${issues.join('; ')}`, OdtErrorCode.CONFIG_ERROR, { configPath, issues });
    }

    currentConfig = { ...parsed.data, stagingRoot: expandHome(parsed.data.stagingRoot) };
    return currentConfig;
}

export function getConfig(): Config {
    return currentConfig;
}
