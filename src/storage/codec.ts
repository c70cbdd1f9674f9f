import { migratePhase } from "../components/GrowPhase";
import type { Growbox } from "../components/GrowboxState";
import type { PhaseHistoryEntry, Plant, PlantNote, WateringEntry } from "../components/PlantState";
import { formatTimestamp, parseTimestamp } from "../core/Clock";
import { parseOrThrow } from "../core/validation";
import type { IntegrationConfig } from "../config";
import { startHistory, validateHistory } from "../systems/PhaseHistorySystem";
import type { ConfigEntry, EntryOptions } from "./EntryStore";
import {
    entryKindSchema,
    growboxDataSchema,
    growboxOptionsSchema,
    plantDataSchema,
    plantOptionsSchema,
} from "./schema";
import type { PhaseEntryRecord, PlantNoteRecord, WateringEntryRecord } from "./schema";

export type EntryKind = "plant" | "growbox";

export function entryKind(entry: ConfigEntry): EntryKind | undefined {
    const result = entryKindSchema.safeParse(entry.data);
    return result.success ? result.data.kind : undefined;
}

/**
 * Maps persisted phase names through the legacy table. Renaming only:
 * adjacent entries that land on the same phase are kept as separate entries.
 */
export function migrateHistory(records: readonly PhaseEntryRecord[]): PhaseHistoryEntry[] {
    return records.map((record, i) => {
        const entry: PhaseHistoryEntry = {
            phase: migratePhase(record.phase),
            start: parseTimestamp(record.start, `phaseHistory.${i}.start`),
        };
        return {
            ...entry,
            ...(record.end !== undefined ? { end: parseTimestamp(record.end, `phaseHistory.${i}.end`) } : {}),
            ...(record.note !== undefined ? { note: record.note } : {}),
        };
    });
}

export function decodePlant(entry: ConfigEntry, config: IntegrationConfig): Plant {
    const data = parseOrThrow(plantDataSchema, entry.data, `plant entry ${entry.entryId} data`);
    const options = parseOrThrow(plantOptionsSchema, entry.options, `plant entry ${entry.entryId} options`);
    const plantedAt = parseTimestamp(options.plantedAt, "plantedAt");

    const phaseHistory =
        options.phaseHistory.length > 0
            ? migrateHistory(options.phaseHistory)
            : startHistory(migratePhase(options.growthStage ?? "early_veg"), plantedAt);
    validateHistory(phaseHistory, plantedAt);

    const wateringLog: WateringEntry[] = options.wateringLog.map((record, i) => ({
        timestamp: parseTimestamp(record.timestamp, `wateringLog.${i}.timestamp`),
        volumeMl: record.volumeMl,
        ...(record.note !== undefined ? { note: record.note } : {}),
    }));

    const notes: PlantNote[] = options.notes.map((record, i) => ({
        timestamp: parseTimestamp(record.timestamp, `notes.${i}.timestamp`),
        note: record.note,
    }));

    return {
        id: data.plantId,
        name: data.name,
        strain: options.strain,
        plantedAt,
        growboxId: data.growboxId,
        defaultWaterVolumeMl: options.defaultWaterVolumeMl ?? config.defaultWaterVolumeMl,
        phaseHistory,
        wateringLog,
        notes,
    };
}

export function encodePlantOptions(plant: Plant): EntryOptions {
    const phaseHistory: PhaseEntryRecord[] = plant.phaseHistory.map((entry) => ({
        phase: entry.phase,
        start: formatTimestamp(entry.start),
        ...(entry.end !== undefined ? { end: formatTimestamp(entry.end) } : {}),
        ...(entry.note !== undefined ? { note: entry.note } : {}),
    }));
    const wateringLog: WateringEntryRecord[] = plant.wateringLog.map((entry) => ({
        timestamp: formatTimestamp(entry.timestamp),
        volumeMl: entry.volumeMl,
        ...(entry.note !== undefined ? { note: entry.note } : {}),
    }));
    const notes: PlantNoteRecord[] = plant.notes.map((entry) => ({
        timestamp: formatTimestamp(entry.timestamp),
        note: entry.note,
    }));

    return {
        strain: plant.strain,
        plantedAt: formatTimestamp(plant.plantedAt),
        defaultWaterVolumeMl: plant.defaultWaterVolumeMl,
        phaseHistory,
        wateringLog,
        notes,
    };
}

export function decodeGrowbox(entry: ConfigEntry, config: IntegrationConfig): Growbox {
    const data = parseOrThrow(growboxDataSchema, entry.data, `growbox entry ${entry.entryId} data`);
    const options = parseOrThrow(growboxOptionsSchema, entry.options, `growbox entry ${entry.entryId} options`);

    return {
        id: data.growboxId,
        name: data.name,
        temperatureSensor: options.temperatureSensor,
        humiditySensor: options.humiditySensor,
        hygrostat: options.hygrostat,
        targetVpd: options.targetVpd ?? config.defaultTargetVpd,
    };
}

export function encodeGrowboxOptions(growbox: Growbox): EntryOptions {
    return {
        ...(growbox.temperatureSensor !== undefined ? { temperatureSensor: growbox.temperatureSensor } : {}),
        ...(growbox.humiditySensor !== undefined ? { humiditySensor: growbox.humiditySensor } : {}),
        ...(growbox.hygrostat !== undefined ? { hygrostat: growbox.hygrostat } : {}),
        targetVpd: growbox.targetVpd,
    };
}
