export type EntityID = string;
export type OwnerID = string;

export enum EntityKind {
    SENSOR = "sensor",
    NUMBER = "number",
    SELECT = "select",
    BUTTON = "button",
    DATE = "date",
    TEXT = "text",
}

export type Attributes = Record<string, string | number | boolean | null>;

/**
 * Capability interface every exposed entity implements.
 * `update()` pulls fresh state from the owning coordinator, `value()` reports it.
 */
export abstract class Entity<V = unknown> {
    public readonly id: EntityID;
    public readonly ownerID: OwnerID;
    public readonly kind: EntityKind;
    public name: string;
    public icon: string | null = null;
    public unit: string | null = null;

    constructor(id: EntityID, ownerID: OwnerID, kind: EntityKind, name: string) {
        this.id = id;
        this.ownerID = ownerID;
        this.kind = kind;
        this.name = name;
    }

    public abstract value(): V | undefined;

    public abstract update(): void;

    public attributes(): Attributes {
        return {};
    }
}

export class EntityRegistry {
    private entities: Map<EntityID, Entity> = new Map();

    // Entity ids per owning config entry, so an unload drops them together
    private ownerCache: Map<OwnerID, Set<EntityID>> = new Map();

    public register(entity: Entity): void {
        if (this.entities.has(entity.id)) {
            throw new Error(`Entity ${entity.id} is already registered`);
        }
        this.entities.set(entity.id, entity);

        let owned = this.ownerCache.get(entity.ownerID);
        if (!owned) {
            owned = new Set();
            this.ownerCache.set(entity.ownerID, owned);
        }
        owned.add(entity.id);
    }

    public registerAll(entities: Iterable<Entity>): void {
        for (const entity of entities) {
            this.register(entity);
        }
    }

    public unregister(id: EntityID): void {
        const entity = this.entities.get(id);
        if (entity) {
            this.ownerCache.get(entity.ownerID)?.delete(id);
            this.entities.delete(id);
        }
    }

    /**
     * Removes every entity owned by the given config entry.
     * Returns how many were removed.
     */
    public removeOwner(ownerID: OwnerID): number {
        const owned = this.ownerCache.get(ownerID);
        if (!owned) return 0;

        const count = owned.size;
        for (const id of owned) {
            this.entities.delete(id);
        }
        this.ownerCache.delete(ownerID);
        return count;
    }

    public get(id: EntityID): Entity | undefined {
        return this.entities.get(id);
    }

    public has(id: EntityID): boolean {
        return this.entities.has(id);
    }

    public getOwned(ownerID: OwnerID): Entity[] {
        const owned = this.ownerCache.get(ownerID);
        if (!owned) return [];
        const result: Entity[] = [];
        for (const id of owned) {
            const entity = this.entities.get(id);
            if (entity) result.push(entity);
        }
        return result;
    }

    public updateOwned(ownerID: OwnerID): void {
        for (const entity of this.getOwned(ownerID)) {
            entity.update();
        }
    }

    public get size(): number {
        return this.entities.size;
    }
}
