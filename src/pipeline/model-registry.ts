import type { ModelEntry, ModelRegistryConfig } from '../config.js';

/** Always resolvable, even when the registry file does not list it */
export const BASELINE_MODEL: ModelEntry = {
    key: 'nova-pro',
    displayName: 'Amazon Nova Pro',
    backend: { type: 'managed-llm', modelId: 'amazon.nova-pro-v1:0' },
    inference: { maxTokens: 2048, temperature: 0.7 },
};

export interface ModelSelection {
    primary: ModelEntry;
    fallback: ModelEntry | null;
    diagnostics: string[];
}

export class ModelRegistry {
    private byKey: Map<string, ModelEntry>;

    constructor(private config: ModelRegistryConfig) {
        this.byKey = new Map(config.models.map((entry) => [entry.key, entry]));
    }

    get entries(): ModelEntry[] {
        return [...this.config.models];
    }

    get(key: string): ModelEntry | undefined {
        return this.byKey.get(key) ?? (key === BASELINE_MODEL.key ? BASELINE_MODEL : undefined);
    }

    /**
     * Primary: override, registry default, first entry, baseline.
     * Fallback: the first of registry fallback, baseline, registry default
     * that exists and differs from the primary.
     */
    resolve(overrideKey?: string): ModelSelection {
        const diagnostics: string[] = [];

        let primary: ModelEntry | undefined;
        if (overrideKey) {
            primary = this.get(overrideKey);
            if (!primary) diagnostics.push(`Unknown model key "${overrideKey}" in LLM_MODEL_KEY was ignored`);
        }
        primary ??= (this.config.default ? this.get(this.config.default) : undefined)
            ?? this.config.models[0]
            ?? BASELINE_MODEL;

        const candidates = [this.config.fallback, BASELINE_MODEL.key, this.config.default];
        let fallback: ModelEntry | null = null;
        for (const key of candidates) {
            if (!key || key === primary.key) continue;
            const entry = this.get(key);
            if (entry) {
                fallback = entry;
                break;
            }
        }

        return { primary, fallback, diagnostics };
    }
}
