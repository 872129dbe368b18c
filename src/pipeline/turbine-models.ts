import type { AliasMatchStrategy, TurbineModelTable } from '../config.js';

interface AliasEntry {
    alias: string;
    modelId: string;
    order: number;
}

/**
 * Maps free-text equipment mentions ("Taurus-60", "smt 60") to canonical
 * turbine model ids. Matching is a case-insensitive substring test; the
 * table's match strategy decides between several hits.
 */
export class TurbineModelDetector {
    private aliases: AliasEntry[];
    private strategy: AliasMatchStrategy;

    constructor(table: TurbineModelTable) {
        this.strategy = table.matchStrategy;
        this.aliases = table.models
            .flatMap((model) => model.aliases.map((alias) => ({ alias: alias.toLowerCase(), modelId: model.id })))
            .map((entry, order) => ({ ...entry, order }));
    }

    get modelIds(): string[] {
        return [...new Set(this.aliases.map((entry) => entry.modelId))];
    }

    detect(text: string): string | null {
        const haystack = text.toLowerCase();
        const matches = this.aliases.filter((entry) => haystack.includes(entry.alias));
        if (matches.length === 0) return null;

        if (this.strategy === 'longest-alias') {
            // Stable: equal lengths keep declaration order.
            const [best] = [...matches].sort((a, b) => b.alias.length - a.alias.length || a.order - b.order);
            return best.modelId;
        }

        return matches[0].modelId;
    }
}
