import type { GrowPhase } from "../components/GrowPhase";
import type { Plant } from "../components/PlantState";
import type { IntegrationConfig } from "../config";
import { InvalidConfigError, NotFoundError, OutOfRangeError } from "../core/errors";
import { startHistory } from "../systems/PhaseHistorySystem";
import { validateStrain } from "../systems/PlantRecordSystem";
import { encodeGrowboxOptions, encodePlantOptions, entryKind } from "./codec";
import type { ConfigEntry, EntryDraft } from "./EntryStore";

export interface NewPlant {
    strain: string;
    plantedAt: Date;
    growboxId: string;
    initialPhase?: GrowPhase;
    defaultWaterVolumeMl?: number;
}

export interface NewGrowbox {
    name: string;
    temperatureSensor?: string;
    humiditySensor?: string;
    hygrostat?: string;
    targetVpd?: number;
}

export function slugify(name: string): string {
    return name
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "");
}

/**
 * Next free "<strain> <n>" name, e.g. "Blue Dream 3" when 1 and 2 are taken.
 * A number is also skipped when its name slugs to one of `takenIds`.
 */
export function generatePlantName(
    strain: string,
    existingNames: readonly string[],
    takenIds: ReadonlySet<string> = new Set(),
): string {
    const cleanStrain = strain.replace(/[^a-zA-Z0-9\s]/g, "").trim() || "Unknown";

    const taken = new Set<number>();
    for (const name of existingNames) {
        if (!name.startsWith(cleanStrain)) continue;
        const remaining = name.slice(cleanStrain.length).trim();
        if (/^\d+$/.test(remaining)) {
            taken.add(Number(remaining));
        }
    }

    let next = 1;
    while (taken.has(next) || takenIds.has(slugify(`${cleanStrain} ${next}`))) {
        next++;
    }
    return `${cleanStrain} ${next}`;
}

function namesOf(existing: readonly ConfigEntry[], kind: "plant" | "growbox"): string[] {
    const names: string[] = [];
    for (const entry of existing) {
        const name = entry.data["name"];
        if (entryKind(entry) === kind && typeof name === "string") {
            names.push(name);
        }
    }
    return names;
}

function plantIds(existing: readonly ConfigEntry[]): Set<string> {
    const ids = new Set<string>();
    for (const entry of existing) {
        const id = entry.data["plantId"];
        if (entryKind(entry) === "plant" && typeof id === "string") {
            ids.add(id);
        }
    }
    return ids;
}

function growboxIds(existing: readonly ConfigEntry[]): string[] {
    const ids: string[] = [];
    for (const entry of existing) {
        const id = entry.data["growboxId"];
        if (entryKind(entry) === "growbox" && typeof id === "string") {
            ids.push(id);
        }
    }
    return ids;
}

/**
 * Builds the entry for a new plant, including its first open phase entry.
 */
export function createPlantDraft(input: NewPlant, existing: readonly ConfigEntry[], config: IntegrationConfig): EntryDraft {
    const strain = validateStrain(input.strain);

    if (!growboxIds(existing).includes(input.growboxId)) {
        throw new NotFoundError("Growbox", input.growboxId);
    }

    const volume = input.defaultWaterVolumeMl ?? config.defaultWaterVolumeMl;
    if (!Number.isInteger(volume) || volume < config.minDefaultWaterVolumeMl || volume > config.maxDefaultWaterVolumeMl) {
        throw new OutOfRangeError(
            "Default water volume (ml)",
            volume,
            config.minDefaultWaterVolumeMl,
            config.maxDefaultWaterVolumeMl,
        );
    }

    const takenIds = plantIds(existing);
    const name = generatePlantName(strain, namesOf(existing, "plant"), takenIds);
    const plantId = slugify(name);

    const plant: Plant = {
        id: plantId,
        name,
        strain,
        plantedAt: input.plantedAt,
        growboxId: input.growboxId,
        defaultWaterVolumeMl: volume,
        phaseHistory: startHistory(input.initialPhase ?? "early_veg", input.plantedAt),
        wateringLog: [],
        notes: [],
    };

    return {
        title: name,
        data: { kind: "plant", plantId, name, growboxId: input.growboxId },
        options: encodePlantOptions(plant),
    };
}

export function createGrowboxDraft(input: NewGrowbox, existing: readonly ConfigEntry[], config: IntegrationConfig): EntryDraft {
    const name = input.name.trim();
    const growboxId = slugify(name);
    if (growboxId.length === 0) {
        throw new InvalidConfigError(`Growbox name "${input.name}" has no usable characters`);
    }
    if (growboxIds(existing).includes(growboxId)) {
        throw new InvalidConfigError(`A growbox with id "${growboxId}" already exists`);
    }

    const targetVpd = input.targetVpd ?? config.defaultTargetVpd;
    if (targetVpd < config.minTargetVpd || targetVpd > config.maxTargetVpd) {
        throw new OutOfRangeError("Target VPD (kPa)", targetVpd, config.minTargetVpd, config.maxTargetVpd);
    }

    return {
        title: name,
        data: { kind: "growbox", growboxId, name },
        options: encodeGrowboxOptions({
            id: growboxId,
            name,
            temperatureSensor: input.temperatureSensor,
            humiditySensor: input.humiditySensor,
            hygrostat: input.hygrostat,
            targetVpd,
        }),
    };
}
