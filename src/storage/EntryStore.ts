import { NotFoundError } from "../core/errors";

export type EntryOptions = Record<string, unknown>;

/**
 * A host configuration entry. `data` is fixed at creation, `options` is the
 * mutable blob the integration reads and writes whole.
 */
export interface ConfigEntry {
    readonly entryId: string;
    readonly title: string;
    readonly data: Readonly<Record<string, unknown>>;
    readonly options: Readonly<EntryOptions>;
}

export type EntryDraft = Omit<ConfigEntry, "entryId">;

export interface EntryStore {
    get(entryId: string): ConfigEntry | undefined;
    entries(): ConfigEntry[];
    add(draft: EntryDraft): ConfigEntry;
    /** Replaces the entry's whole options blob. */
    updateOptions(entryId: string, options: EntryOptions): void;
    remove(entryId: string): boolean;
}

/**
 * In-process store. Values are cloned on the way in and out so callers
 * can never hold a live reference to stored state.
 */
export class MemoryEntryStore implements EntryStore {
    private store: Map<string, ConfigEntry> = new Map();
    private nextEntryID: number = 1;

    public get(entryId: string): ConfigEntry | undefined {
        const entry = this.store.get(entryId);
        return entry ? structuredClone(entry) : undefined;
    }

    public entries(): ConfigEntry[] {
        return Array.from(this.store.values(), (entry) => structuredClone(entry));
    }

    public add(draft: EntryDraft): ConfigEntry {
        const entry: ConfigEntry = { ...structuredClone(draft), entryId: `entry_${this.nextEntryID++}` };
        this.store.set(entry.entryId, entry);
        return structuredClone(entry);
    }

    public updateOptions(entryId: string, options: EntryOptions): void {
        const entry = this.store.get(entryId);
        if (!entry) {
            throw new NotFoundError("Config entry", entryId);
        }
        this.store.set(entryId, { ...entry, options: structuredClone(options) });
    }

    public remove(entryId: string): boolean {
        return this.store.delete(entryId);
    }
}
