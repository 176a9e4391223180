/**
 * UI Components - terminal panels for answers, sources and catalog stats
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { marked } from 'marked';
import TerminalRenderer from 'marked-terminal';
import gradient from 'gradient-string';
import { colors, icons, createHeader, divider, getBoxOuterWidth, sourceLine } from './theme.js';
import type { UiMode } from '../config.js';
import type { CourseAnalytics } from '../assistant/course-assistant.js';
import type { SourceAttribution } from '../tools/types.js';

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

function panel(body: string, title: string, borderColor: string): string {
    return boxen(body, {
        padding: 1,
        borderStyle: 'round',
        borderColor,
        title,
        titleAlignment: 'left',
        width: getBoxOuterWidth(),
    });
}

/**
 * Display the app header
 */
export function showHeader(options: { title?: string; model?: string; subtitle?: string } = {}): void {
    const { title = 'Course Assistant', model, subtitle } = options;
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const lines: string[] = [gradient(['#0F766E', '#0891B2', '#2563EB'])(title)];
        if (model) lines.push(colors.muted(`Model: ${model}`));
        if (subtitle) lines.push(colors.muted(subtitle));

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#0F766E',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(createHeader(title, model ? `Model: ${model}` : undefined));
    if (subtitle) console.log(colors.muted(subtitle));
    console.log(colors.muted(divider()));
}

export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        stream: process.stderr,
    });
}

export function renderMarkdown(markdown: string): string {
    const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
        ? Math.min(process.stdout.columns, 100)
        : 80;

    marked.setOptions({
        renderer: new TerminalRenderer({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }),
    });

    const rendered = marked.parse(markdown);
    return typeof rendered === 'string' ? rendered.trimEnd() : markdown;
}

export function showAnswer(answer: string, options: { renderMarkdown?: boolean } = {}): void {
    const body = options.renderMarkdown === false || getUiMode() === 'plain'
        ? answer
        : renderMarkdown(answer);

    console.log();
    if (getUiMode() === 'fancy') {
        console.log(panel(body, 'Answer', '#0F766E'));
        return;
    }
    console.log(body);
}

export function showSources(sources: SourceAttribution[]): void {
    if (sources.length === 0) return;

    const lines = sources.map((source, index) => sourceLine(index, source.label, source.link)).join('\n');

    console.log();
    if (getUiMode() === 'fancy') {
        console.log(panel(lines, 'Sources', '#2563EB'));
        return;
    }
    console.log(colors.primary('Sources'));
    console.log(lines);
}

export function showCourseStats(analytics: CourseAnalytics): void {
    const lines = [
        `${colors.muted('Total courses:')} ${analytics.totalCourses}`,
        '',
        ...analytics.courseTitles.map((title) => `${colors.secondary(icons.book)} ${title}`),
    ].join('\n');

    console.log();
    if (getUiMode() === 'fancy') {
        console.log(panel(lines, 'Catalog', '#0F766E'));
        return;
    }
    console.log(colors.primary('Catalog'));
    console.log(lines);
}

/**
 * Show completion message
 */
export function showComplete(outputPath?: string): void {
    const mode = getUiMode();
    console.log();
    const msg = mode === 'fancy'
        ? gradient(['#10B981', '#06B6D4'])('Done')
        : colors.success('Done');
    console.log(`${colors.success(icons.complete)} ${msg}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}

export function showInfo(message: string): void {
    console.log(colors.muted(`${icons.arrow} ${message}`));
}
