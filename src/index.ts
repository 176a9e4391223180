#!/usr/bin/env node
/**
 * Course Assistant CLI - Main Entry Point
 * Answers questions about a course catalog with tool-calling models on OpenRouter
 */

import 'dotenv/config';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { ensureConfig, loadConfig, parseUiMode, validateConfig, MAX_TOOL_ROUNDS_LIMIT, type Config } from './config.js';
import { createCourseAssistant, getCourseAnalytics, type QueryResult } from './assistant/course-assistant.js';
import { LocalCourseStore } from './catalog/local-course-store.js';
import { ChatRepl } from './chat/repl.js';
import { formatAnswerJson, saveAnswer } from './export/formats.js';
import {
    showHeader,
    showAnswer,
    showSources,
    showCourseStats,
    showComplete,
    showError,
    createSpinner,
} from './ui/components.js';
import { colors } from './ui/theme.js';

function readPackageVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
        return raw.version;
    }
    return '0.0.0';
}

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

function parseRounds(value: string): number {
    const rounds = Number(value);
    if (!Number.isInteger(rounds) || rounds < 1 || rounds > MAX_TOOL_ROUNDS_LIMIT) {
        throw new InvalidArgumentError(`Must be an integer from 1 to ${MAX_TOOL_ROUNDS_LIMIT}.`);
    }
    return rounds;
}

function applyUiMode(ui: string | undefined): void {
    const preflight = loadConfig();
    process.env.UI_MODE = parseUiMode(ui, preflight.uiMode);
}

function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Paste your OpenRouter API key (it will be saved to .env).'));
    console.log(colors.muted('Tip: run `course-assistant init` anytime to change defaults.'));
    console.log();
}

async function configureOrPrompt(): Promise<Config> {
    const validation = validateConfig(loadConfig());
    if (!validation.valid) maybeShowSetupIntro(validation.errors);
    return ensureConfig();
}

function fail(error: unknown): never {
    showError(error instanceof Error ? error.message : String(error));
    process.exit(1);
}

const program = new Command();

program
    .name('course-assistant')
    .description('Ask questions about course materials')
    .version(readPackageVersion());

program
    .command('init')
    .description('Set up the OpenRouter API key and default model')
    .action(async () => {
        try {
            applyUiMode(undefined);

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your settings to .env in this folder.'));
            console.log();

            await ensureConfig({ force: true });
            console.log(colors.success('Saved configuration to .env'));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('ask')
    .description('Answer one question about the course materials')
    .argument('<query>', 'Question to answer')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--rounds <n>', `Tool rounds allowed (1-${MAX_TOOL_ROUNDS_LIMIT})`, parseRounds)
    .option('--catalog <path>', 'Course catalog JSON file')
    .option('--json', 'Print the answer and sources as JSON')
    .option('-o, --output <file>', 'Save the answer (.md, .json, .html or .txt)')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (
        query: string,
        options: { model?: string; rounds?: number; catalog?: string; json?: boolean; output?: string; ui?: string }
    ) => {
        try {
            applyUiMode(options.ui);
            const config = await configureOrPrompt();
            const assistant = await createCourseAssistant(config, {
                model: options.model,
                maxRounds: options.rounds,
                catalogPath: options.catalog,
            });

            if (options.json) {
                const result = await assistant.query(query);
                process.stdout.write(formatAnswerJson(result, query));
                if (options.output) await saveAnswer(options.output, result, query);
                return;
            }

            showHeader({ model: options.model ?? config.defaultModel, subtitle: `Question: ${query}` });

            const spinner = createSpinner('Searching course materials...');
            spinner.start();
            let result: QueryResult;
            try {
                result = await assistant.query(query);
                spinner.succeed('Answer ready');
            } catch (error) {
                spinner.fail('Could not answer');
                throw error;
            }

            showAnswer(result.answer, { renderMarkdown: config.renderMarkdown });
            showSources(result.sources);

            if (options.output) await saveAnswer(options.output, result, query);
            showComplete(options.output);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('chat', { isDefault: true })
    .description('Start an interactive conversation')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--rounds <n>', `Tool rounds allowed (1-${MAX_TOOL_ROUNDS_LIMIT})`, parseRounds)
    .option('--catalog <path>', 'Course catalog JSON file')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (options: { model?: string; rounds?: number; catalog?: string; ui?: string }) => {
        try {
            applyUiMode(options.ui);
            const config = await configureOrPrompt();
            const assistant = await createCourseAssistant(config, {
                model: options.model,
                maxRounds: options.rounds,
                catalogPath: options.catalog,
            });

            const repl = new ChatRepl(assistant, {
                model: options.model ?? config.defaultModel,
                renderMarkdown: config.renderMarkdown,
            });
            await repl.start();
        } catch (error) {
            fail(error);
        }
    });

program
    .command('courses')
    .description('Show catalog statistics')
    .option('--catalog <path>', 'Course catalog JSON file')
    .option('--json', 'Output JSON')
    .action(async (options: { catalog?: string; json?: boolean }) => {
        try {
            const config = loadConfig();
            process.env.UI_MODE = config.uiMode;

            const store = await LocalCourseStore.fromFile(options.catalog ?? config.catalogPath);
            const analytics = await getCourseAnalytics(store);

            if (options.json) {
                console.log(JSON.stringify(analytics, null, 2));
                return;
            }
            showCourseStats(analytics);
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch(fail);
