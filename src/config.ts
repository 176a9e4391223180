/**
 * Configuration management for the course assistant
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors.js';
import { envBool, envBoundedInt, envNumber, envPositiveInt, envString } from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/** Hard cap on tool rounds regardless of what the environment asks for. */
export const MAX_TOOL_ROUNDS_LIMIT = 5;

const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../data/courses.json', import.meta.url));

/**
 * Centralized default values for the CLI configuration.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    model: 'anthropic/claude-sonnet-4',
    modelTemperature: 0,
    modelMaxTokens: 800,
    maxToolRounds: 2,
    maxResults: 5,
    maxHistory: 2,
    catalogPath: BUNDLED_CATALOG_PATH,
    llmTimeoutMs: 60_000,
    logLevel: 'warn',
    uiMode: 'fancy' as UiMode,
    renderMarkdown: true,
} as const;

export interface Config {
    openrouterApiKey: string;
    defaultModel: string;
    modelTemperature: number;
    modelMaxTokens: number;
    maxToolRounds: number;
    maxResults: number;
    maxHistory: number;
    catalogPath: string;
    llmTimeoutMs: number;
    logLevel: string;
    uiMode: UiMode;
    renderMarkdown: boolean;
}

export function parseUiMode(value: string | undefined, defaultValue: UiMode = DEFAULTS.uiMode): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return defaultValue;
}

function resolvePath(value: string): string {
    return path.isAbsolute(value) ? value : path.join(process.cwd(), value);
}

export function loadConfig(): Config {
    const catalogOverride = process.env.COURSE_CATALOG_PATH?.trim();

    return {
        openrouterApiKey: process.env.OPENROUTER_API_KEY?.trim() || '',
        defaultModel: envString(process.env.DEFAULT_MODEL, DEFAULTS.model),
        modelTemperature: envNumber(process.env.MODEL_TEMPERATURE, DEFAULTS.modelTemperature),
        modelMaxTokens: envPositiveInt(process.env.MODEL_MAX_TOKENS, DEFAULTS.modelMaxTokens),
        maxToolRounds: envBoundedInt(process.env.MAX_TOOL_ROUNDS, DEFAULTS.maxToolRounds, MAX_TOOL_ROUNDS_LIMIT),
        maxResults: envPositiveInt(process.env.MAX_RESULTS, DEFAULTS.maxResults),
        maxHistory: envPositiveInt(process.env.MAX_HISTORY, DEFAULTS.maxHistory),
        catalogPath: catalogOverride ? resolvePath(catalogOverride) : DEFAULTS.catalogPath,
        llmTimeoutMs: envPositiveInt(process.env.OPENROUTER_TIMEOUT_MS, DEFAULTS.llmTimeoutMs),
        logLevel: envString(process.env.LOG_LEVEL, DEFAULTS.logLevel).toLowerCase(),
        uiMode: parseUiMode(process.env.UI_MODE),
        renderMarkdown: envBool(process.env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
    };
}

export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!config.openrouterApiKey) {
        errors.push('OPENROUTER_API_KEY is not set');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) throw error;
    }

    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') lines.pop();
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        const key = match?.[1];
        if (!key) return line;

        const update = updates[key];
        if (update === undefined) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(update)}`;
    });

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = `${nextLines.join('\n')}\n`;
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (existing === '') writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.COURSE_ASSISTANT_ENV_PATH?.trim();
    if (explicit) return resolvePath(explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

/**
 * Load config, prompting for whatever is missing when a terminal is attached.
 * `force` re-asks for the key and model even when both are set.
 */
export async function ensureConfig(
    options: { envPath?: string; force?: boolean } = {}
): Promise<Config> {
    const current = loadConfig();
    const validation = validateConfig(current);
    const missingRequired = !validation.valid;

    if (!options.force && !missingRequired) return current;

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt) {
        if (!missingRequired) return current;
        throw new ConfigError(
            `Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`,
            'OPENROUTER_API_KEY'
        );
    }

    const inquirer = (await import('inquirer')).default;

    const answers = await inquirer.prompt<{ openrouterApiKey: string; defaultModel: string }>([
        {
            type: 'password',
            name: 'openrouterApiKey',
            message: 'Paste your OpenRouter API key',
            mask: '*',
            default: current.openrouterApiKey || undefined,
            validate: (input: string) => input.trim().length > 0 || 'OpenRouter API key is required',
        },
        {
            type: 'input',
            name: 'defaultModel',
            message: 'Default OpenRouter model id',
            default: current.defaultModel,
            validate: (input: string) => input.trim().length > 0 || 'Model id is required',
        },
    ]);

    const next: Config = {
        ...current,
        openrouterApiKey: answers.openrouterApiKey.trim(),
        defaultModel: answers.defaultModel.trim(),
    };

    await writeEnvVars(
        {
            OPENROUTER_API_KEY: next.openrouterApiKey,
            DEFAULT_MODEL: next.defaultModel,
        },
        { envPath: options.envPath }
    );

    return next;
}
