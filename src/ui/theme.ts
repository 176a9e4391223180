/**
 * UI Theme - palette, icons and line helpers for the CLI
 */

import chalk from 'chalk';
import figures from 'figures';

export function isPlainMode(): boolean {
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    return ui === 'plain' || process.env.NO_COLOR !== undefined;
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 112): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Small margin so the right border never soft-wraps.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

// Color palette
export const colors = {
    primary: maybeColor(chalk.hex('#0F766E')),      // Teal (accent)
    secondary: maybeColor(chalk.hex('#2563EB')),    // Blue
    success: maybeColor(chalk.hex('#10B981')),      // Green
    warning: maybeColor(chalk.hex('#F59E0B')),      // Amber
    error: maybeColor(chalk.hex('#EF4444')),        // Red
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    link: maybeColor(chalk.underline),
};

export const gradients = {
    title: (text: string) => (isPlainMode() ? text : chalk.bold(colors.primary(text))),
    success: (text: string) => (isPlainMode() ? text : chalk.bold(colors.success(text))),
};

// `figures` gives OS-safe fallbacks
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    arrow: figures.arrowRight,
    bullet: figures.bullet,
    book: figures.square,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

export function createHeader(title: string, subtitle?: string): string {
    const parts = [gradients.title(title)];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

/**
 * `1. Course - Lesson 2` with the link on the line below, when there is one.
 */
export function sourceLine(index: number, label: string, link: string | null): string {
    const head = `${colors.dim(`${index + 1}.`)} ${label}`;
    return link ? `${head}\n   ${colors.link(colors.muted(link))}` : head;
}
