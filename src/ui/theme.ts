/**
 * UI Theme - Design system for the CLI
 * Provides consistent styling with a clean, minimal palette
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

export function getBoxOuterWidth(maxWidth: number = 100): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

// Color palette
export const colors = {
    primary: maybeColor(chalk.hex('#0E7490')),      // Teal (accent)
    secondary: maybeColor(chalk.hex('#F97316')),    // Orange (turbine hot section)
    success: maybeColor(chalk.hex('#10B981')),      // Green
    warning: maybeColor(chalk.hex('#F59E0B')),      // Amber
    error: maybeColor(chalk.hex('#EF4444')),        // Red
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    bold: maybeColor(chalk.bold),
};

export const HEADER_GRADIENT = ['#0E7490', '#06B6D4', '#F59E0B', '#F97316'];

// Status/icons (use `figures` for OS-safe fallbacks)
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    arrow: figures.arrowRight,
    bullet: figures.bullet,
    info: figures.info,
    document: figures.square,
    pointer: figures.pointerSmall,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

/**
 * Color for a confidence score: green from 0.8, amber from the threshold, red below.
 */
export function confidenceColor(score: number, threshold: number): (text: string) => string {
    if (score >= 0.8) return colors.success;
    if (score >= threshold) return colors.warning;
    return colors.error;
}

export function sectionHeader(title: string): string {
    return `\n${colors.primary(title)}\n`;
}
