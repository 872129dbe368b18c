import { loadConfig, validateConfig, type ConfigRequirements } from '../config.js';
import { setLogLevel } from '../logger.js';
import { colors } from '../ui/theme.js';

export function applyUiMode(ui: string | undefined): void {
    const mode = ui?.trim() || loadConfig().uiMode;
    process.env.UI_MODE = mode;
}

export function applyVerbosity(verbose: boolean | undefined): void {
    if (verbose) setLogLevel('debug');
}

/**
 * Explain the interactive setup before ensureConfig prompts for what is missing.
 */
export function maybeShowSetupIntro(required: ConfigRequirements): void {
    const { errors } = validateConfig(loadConfig(), required);
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Answer a few questions (they will be saved to .env).'));
    console.log(colors.muted(`Missing: ${errors.map(e => e.replace(' is not set', '')).join(', ')}`));
    console.log(colors.muted('Tip: run `turbine-assist init` anytime to change defaults.'));
    console.log();
}
