import { loadConfig } from "./config";
import type { IntegrationConfig } from "./config";
import { GrowboxCoordinator } from "./coordinators/GrowboxCoordinator";
import type { StateReader } from "./coordinators/GrowboxCoordinator";
import type { CoordinatorContext } from "./coordinators/Coordinator";
import { PlantCoordinator } from "./coordinators/PlantCoordinator";
import { SystemClock } from "./core/Clock";
import type { Clock } from "./core/Clock";
import { InvalidConfigError, isGrowJournalError } from "./core/errors";
import { Logger } from "./core/Logger";
import type { LogSink } from "./core/Logger";
import { EntityRegistry } from "./core/Registry";
import type { Entity } from "./core/Registry";
import { createGrowboxEntities } from "./entities/GrowboxEntities";
import { createPlantEntities } from "./entities/PlantEntities";
import { PlantServices } from "./services/PlantServices";
import { entryKind } from "./storage/codec";
import { createGrowboxDraft, createPlantDraft } from "./storage/entries";
import type { NewGrowbox, NewPlant } from "./storage/entries";
import type { ConfigEntry, EntryStore } from "./storage/EntryStore";

/**
 * What the host hands the integration at startup.
 */
export interface HostContext {
    store: EntryStore;
    states: StateReader;
    clock?: Clock;
    logSink?: LogSink;
    config?: unknown;
}

export class GrowJournal {
    public readonly config: IntegrationConfig;
    public readonly registry: EntityRegistry = new EntityRegistry();
    public readonly services: PlantServices;

    private readonly store: EntryStore;
    private readonly states: StateReader;
    private readonly context: CoordinatorContext;
    private readonly logger: Logger;

    // Keyed by config entry id
    private plants: Map<string, PlantCoordinator> = new Map();
    private growboxes: Map<string, GrowboxCoordinator> = new Map();

    constructor(host: HostContext) {
        this.config = loadConfig(host.config ?? {});
        this.store = host.store;
        this.states = host.states;
        this.logger = new Logger("GrowJournal", host.logSink);
        this.context = {
            store: host.store,
            clock: host.clock ?? new SystemClock(),
            logger: this.logger,
        };
        this.services = new PlantServices((plantId) => this.getPlant(plantId), this.logger);
    }

    /**
     * Loads one config entry and registers its entities.
     * Returns false, after logging, when the entry cannot be loaded.
     */
    public setupEntry(entryId: string): boolean {
        if (this.plants.has(entryId) || this.growboxes.has(entryId)) {
            this.logger.warn(`Entry ${entryId} is already set up`);
            return false;
        }

        const entry = this.store.get(entryId);
        if (!entry) {
            this.logger.error(`Entry ${entryId} not found`);
            return false;
        }

        const kind = entryKind(entry);
        if (kind === undefined) {
            this.logger.error(`Unknown device type in entry ${entryId}`);
            return false;
        }

        try {
            let entities: Entity[];
            if (kind === "plant") {
                const coordinator = new PlantCoordinator(entryId, this.context, this.config);
                coordinator.refresh();
                const loaded = this.getPlant(coordinator.plantId);
                if (loaded) {
                    throw new InvalidConfigError(`Plant id ${coordinator.plantId} is already used by entry ${loaded.entryId}`);
                }
                entities = createPlantEntities(coordinator, this.config);
                coordinator.onRefresh(() => this.registry.updateOwned(entryId));
                this.plants.set(entryId, coordinator);
            } else {
                const coordinator = new GrowboxCoordinator(entryId, this.context, this.states, this.config);
                coordinator.refresh();
                const loaded = this.getGrowbox(coordinator.growboxId);
                if (loaded) {
                    throw new InvalidConfigError(`Growbox id ${coordinator.growboxId} is already used by entry ${loaded.entryId}`);
                }
                entities = createGrowboxEntities(coordinator, this.config);
                coordinator.onRefresh(() => this.registry.updateOwned(entryId));
                this.growboxes.set(entryId, coordinator);
            }

            this.registry.registerAll(entities);
            this.registry.updateOwned(entryId);
            this.logger.info(`Set up ${kind} ${entry.title} with ${entities.length} entities`);
            return true;
        } catch (err) {
            this.plants.delete(entryId);
            this.growboxes.delete(entryId);
            this.registry.removeOwner(entryId);
            if (!isGrowJournalError(err)) throw err;
            this.logger.error(`Failed to set up entry ${entryId}: ${err.message}`);
            return false;
        }
    }

    public setupAll(): number {
        let count = 0;
        for (const entry of this.store.entries()) {
            if (this.setupEntry(entry.entryId)) count++;
        }
        return count;
    }

    public unloadEntry(entryId: string): boolean {
        const wasLoaded = this.plants.delete(entryId) || this.growboxes.delete(entryId);
        if (!wasLoaded) return false;

        const removed = this.registry.removeOwner(entryId);
        this.logger.info(`Unloaded entry ${entryId} (${removed} entities)`);
        return true;
    }

    /**
     * Unloads the entry and deletes it from the host's storage.
     */
    public removeEntry(entryId: string): boolean {
        this.unloadEntry(entryId);
        return this.store.remove(entryId);
    }

    public createGrowbox(input: NewGrowbox): ConfigEntry {
        const draft = createGrowboxDraft(input, this.store.entries(), this.config);
        const entry = this.store.add(draft);
        this.setupEntry(entry.entryId);
        return entry;
    }

    public createPlant(input: NewPlant): ConfigEntry {
        const draft = createPlantDraft(input, this.store.entries(), this.config);
        const entry = this.store.add(draft);
        this.setupEntry(entry.entryId);
        return entry;
    }

    /**
     * Recomputes every coordinator's snapshot; owned entities follow through
     * the coordinator's refresh listener.
     * An entry that fails is logged and skipped.
     */
    public refresh(): void {
        const coordinators: Array<PlantCoordinator | GrowboxCoordinator> = [
            ...this.plants.values(),
            ...this.growboxes.values(),
        ];
        for (const coordinator of coordinators) {
            try {
                coordinator.refresh();
            } catch (err) {
                if (!isGrowJournalError(err)) throw err;
                this.logger.error(`Refresh failed for entry ${coordinator.entryId}: ${err.message}`);
            }
        }
    }

    public getPlant(plantId: string): PlantCoordinator | undefined {
        for (const coordinator of this.plants.values()) {
            if (coordinator.plantId === plantId) return coordinator;
        }
        return undefined;
    }

    public getGrowbox(growboxId: string): GrowboxCoordinator | undefined {
        for (const coordinator of this.growboxes.values()) {
            if (coordinator.growboxId === growboxId) return coordinator;
        }
        return undefined;
    }

    public plantsInGrowbox(growboxId: string): PlantCoordinator[] {
        return Array.from(this.plants.values()).filter((coordinator) => coordinator.growboxId === growboxId);
    }

    public entity(id: string): Entity | undefined {
        return this.registry.get(id);
    }
}
