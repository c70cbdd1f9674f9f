import type { Clock } from "../core/Clock";
import { NotFoundError } from "../core/errors";
import type { Logger } from "../core/Logger";
import type { ConfigEntry, EntryOptions, EntryStore } from "../storage/EntryStore";

export interface CoordinatorContext {
    store: EntryStore;
    clock: Clock;
    logger: Logger;
}

/**
 * Owns one config entry. Every operation reads the entry's options blob,
 * applies one change and writes the whole blob back; only the last derived
 * snapshot is kept between calls.
 */
export abstract class Coordinator<TData> {
    public readonly entryId: string;
    protected readonly store: EntryStore;
    protected readonly clock: Clock;
    protected readonly logger: Logger;
    private snapshot: TData | undefined;
    private listeners: Array<(data: TData) => void> = [];

    constructor(entryId: string, context: CoordinatorContext, tag: string) {
        this.entryId = entryId;
        this.store = context.store;
        this.clock = context.clock;
        this.logger = context.logger.child(tag);
    }

    public get data(): TData | undefined {
        return this.snapshot;
    }

    /**
     * Recomputes the derived snapshot from storage and the current time.
     */
    public refresh(): TData {
        const snapshot = this.computeSnapshot();
        this.snapshot = snapshot;
        for (const listener of this.listeners) {
            listener(snapshot);
        }
        return snapshot;
    }

    public onRefresh(listener: (data: TData) => void): void {
        this.listeners.push(listener);
    }

    protected abstract computeSnapshot(): TData;

    protected readEntry(): ConfigEntry {
        const entry = this.store.get(this.entryId);
        if (!entry) {
            throw new NotFoundError("Config entry", this.entryId);
        }
        return entry;
    }

    protected writeOptions(options: EntryOptions): void {
        const current = this.readEntry();
        this.store.updateOptions(this.entryId, { ...current.options, ...options });
    }
}
