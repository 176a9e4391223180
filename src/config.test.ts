/**
 * Unit tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

const originalEnv = process.env;

const CONFIG_KEYS = [
    'OPENROUTER_API_KEY',
    'DEFAULT_MODEL',
    'MODEL_TEMPERATURE',
    'MODEL_MAX_TOKENS',
    'MAX_TOOL_ROUNDS',
    'MAX_RESULTS',
    'MAX_HISTORY',
    'COURSE_CATALOG_PATH',
    'OPENROUTER_TIMEOUT_MS',
    'LOG_LEVEL',
    'UI_MODE',
    'RENDER_MARKDOWN',
];

describe('Config utilities', () => {
    beforeEach(() => {
        vi.resetModules();
        process.env = { ...originalEnv };
        for (const key of CONFIG_KEYS) delete process.env[key];
    });

    afterEach(() => {
        process.env = originalEnv;
    });

    describe('loadConfig', () => {
        it('should load default values when env vars are not set', async () => {
            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.openrouterApiKey).toBe('');
            expect(config.defaultModel).toBe('anthropic/claude-sonnet-4');
            expect(config.modelTemperature).toBe(0);
            expect(config.modelMaxTokens).toBe(800);
            expect(config.maxToolRounds).toBe(2);
            expect(config.maxResults).toBe(5);
            expect(config.maxHistory).toBe(2);
            expect(config.uiMode).toBe('fancy');
            expect(config.renderMarkdown).toBe(true);
            expect(config.catalogPath.endsWith(path.join('data', 'courses.json'))).toBe(true);
        });

        it('should load values from environment variables', async () => {
            process.env.OPENROUTER_API_KEY = ' test-openrouter-key ';
            process.env.DEFAULT_MODEL = 'openai/gpt-4o-mini';
            process.env.UI_MODE = 'minimal';
            process.env.MAX_RESULTS = '3';

            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.openrouterApiKey).toBe('test-openrouter-key');
            expect(config.defaultModel).toBe('openai/gpt-4o-mini');
            expect(config.uiMode).toBe('minimal');
            expect(config.maxResults).toBe(3);
        });

        it('should clamp the tool round budget', async () => {
            process.env.MAX_TOOL_ROUNDS = '12';

            const { loadConfig, MAX_TOOL_ROUNDS_LIMIT } = await import('./config.js');

            expect(loadConfig().maxToolRounds).toBe(MAX_TOOL_ROUNDS_LIMIT);
        });

        it('should fall back to defaults for invalid numbers', async () => {
            process.env.MAX_TOOL_ROUNDS = '0';
            process.env.MODEL_MAX_TOKENS = 'lots';
            process.env.MODEL_TEMPERATURE = '0.4';

            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.maxToolRounds).toBe(2);
            expect(config.modelMaxTokens).toBe(800);
            expect(config.modelTemperature).toBe(0.4);
        });

        it('should resolve a relative catalog path against the working directory', async () => {
            process.env.COURSE_CATALOG_PATH = 'fixtures/catalog.json';

            const { loadConfig } = await import('./config.js');

            expect(loadConfig().catalogPath).toBe(path.join(process.cwd(), 'fixtures/catalog.json'));
        });

        it('should parse boolean env vars correctly', async () => {
            process.env.RENDER_MARKDOWN = '0';

            const { loadConfig } = await import('./config.js');

            expect(loadConfig().renderMarkdown).toBe(false);
        });
    });

    describe('validateConfig', () => {
        it('should return valid when the API key is present', async () => {
            process.env.OPENROUTER_API_KEY = 'test-key';

            const { loadConfig, validateConfig } = await import('./config.js');
            const result = validateConfig(loadConfig());

            expect(result.valid).toBe(true);
            expect(result.errors).toHaveLength(0);
        });

        it('should return errors when OPENROUTER_API_KEY is missing', async () => {
            const { loadConfig, validateConfig } = await import('./config.js');
            const result = validateConfig(loadConfig());

            expect(result.valid).toBe(false);
            expect(result.errors).toEqual(['OPENROUTER_API_KEY is not set']);
        });
    });

    describe('writeEnvVars', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(tmpdir(), 'course-assistant-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should update existing keys and append new ones', async () => {
            const envPath = path.join(dir, '.env');
            await writeFile(envPath, '# settings\nDEFAULT_MODEL=old/model\nUI_MODE=plain\n', 'utf8');

            const { writeEnvVars } = await import('./config.js');
            await writeEnvVars({ DEFAULT_MODEL: 'new/model', OPENROUTER_API_KEY: 'test-key' }, { envPath });

            const contents = await readFile(envPath, 'utf8');
            expect(contents).toBe('# settings\nDEFAULT_MODEL=new/model\nUI_MODE=plain\nOPENROUTER_API_KEY=test-key\n');
            expect(process.env.OPENROUTER_API_KEY).toBe('test-key');
        });

        it('should quote values containing whitespace', async () => {
            const envPath = path.join(dir, '.env');

            const { writeEnvVars } = await import('./config.js');
            await writeEnvVars({ DEFAULT_MODEL: 'a model' }, { envPath });

            expect(await readFile(envPath, 'utf8')).toBe('DEFAULT_MODEL="a model"\n');
        });
    });

    describe('ensureConfig', () => {
        it('should throw a ConfigError when the key is missing and no terminal is attached', async () => {
            const stdinTty = process.stdin.isTTY;
            Object.defineProperty(process.stdin, 'isTTY', { value: false, configurable: true });

            try {
                const { ensureConfig } = await import('./config.js');
                await expect(ensureConfig()).rejects.toThrow('OPENROUTER_API_KEY is not set');
            } finally {
                Object.defineProperty(process.stdin, 'isTTY', { value: stdinTty, configurable: true });
            }
        });

        it('should return the loaded config when nothing is missing', async () => {
            process.env.OPENROUTER_API_KEY = 'test-key';

            const { ensureConfig } = await import('./config.js');
            const config = await ensureConfig();

            expect(config.openrouterApiKey).toBe('test-key');
        });
    });
});
