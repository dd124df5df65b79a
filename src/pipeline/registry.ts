import type { ScholarRegistryData } from '../types/index.js';
import { normalizeName } from '../sources/utils.js';

/**
 * Display name → Scholar profile id lookup, keyed by normalized name so
 * that diacritic, case, whitespace and hyphen variants resolve alike.
 */
export class ScholarRegistry {
    readonly version: string;
    private readonly byName = new Map<string, string>();

    constructor(data: ScholarRegistryData) {
        this.version = data.version;
        for (const [name, scholarId] of Object.entries(data.entries)) {
            const key = normalizeName(name);
            if (key && scholarId.trim() && !this.byName.has(key)) {
                this.byName.set(key, scholarId.trim());
            }
        }
    }

    /**
     * Scholar id for a display name, or '' when the name is not registered.
     */
    lookup(name: string): string {
        return this.byName.get(normalizeName(name)) ?? '';
    }

    get size(): number {
        return this.byName.size;
    }
}
