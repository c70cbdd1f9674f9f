import type { GrowPhase } from "./GrowPhase";

export interface PhaseHistoryEntry {
    readonly phase: GrowPhase;
    readonly start: Date;
    // Unset only on the last entry, the plant's current phase
    readonly end?: Date;
    readonly note?: string;
}

export interface WateringEntry {
    readonly timestamp: Date;
    readonly volumeMl: number;
    readonly note?: string;
}

export interface PlantNote {
    readonly timestamp: Date;
    readonly note: string;
}

/**
 * A plant as loaded from its config entry. Every log is append-only;
 * operations return a new Plant rather than mutating this one.
 */
export interface Plant {
    readonly id: string;
    readonly name: string;
    readonly strain: string;
    readonly plantedAt: Date;
    /** Lookup key of the growbox housing this plant. */
    readonly growboxId: string;
    readonly defaultWaterVolumeMl: number;
    readonly phaseHistory: readonly PhaseHistoryEntry[];
    readonly wateringLog: readonly WateringEntry[];
    readonly notes: readonly PlantNote[];
}

export const STRAIN_PATTERN = /^[a-zA-Z0-9\s\-_]+$/;
export const STRAIN_MAX_LENGTH = 50;
