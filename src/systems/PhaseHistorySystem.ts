import { FLOWER_PHASES, VEG_PHASES, phaseLabel } from "../components/GrowPhase";
import type { GrowPhase } from "../components/GrowPhase";
import type { PhaseHistoryEntry, Plant } from "../components/PlantState";
import { assertValidDate, elapsedMs, toWholeDays } from "../core/Clock";
import { InvalidConfigError, InvalidTransitionError } from "../core/errors";

export type PhaseHistory = readonly PhaseHistoryEntry[];

export function startHistory(phase: GrowPhase, start: Date, note?: string): PhaseHistory {
    return [note === undefined ? { phase, start } : { phase, start, note }];
}

/**
 * Checks the persisted invariants: non-empty, time-ordered, contiguous,
 * and exactly one open entry which is the last one. When `plantedAt` is
 * given the first entry must start on it.
 */
export function validateHistory(history: PhaseHistory, plantedAt?: Date): void {
    if (history.length === 0) {
        throw new InvalidConfigError("Phase history is empty");
    }
    if (plantedAt !== undefined && history[0].start.getTime() !== plantedAt.getTime()) {
        throw new InvalidConfigError(
            `Phase history starts at ${history[0].start.toISOString()}, not at the planted date ${plantedAt.toISOString()}`,
        );
    }

    for (let i = 0; i < history.length; i++) {
        const entry = history[i];
        const isLast = i === history.length - 1;

        if (isLast) {
            if (entry.end !== undefined) {
                throw new InvalidConfigError("Last phase history entry must be open");
            }
            continue;
        }

        const { end } = entry;
        if (end === undefined) {
            throw new InvalidConfigError(`Phase history entry ${i} is open but not last`);
        }
        if (end.getTime() < entry.start.getTime()) {
            throw new InvalidConfigError(`Phase history entry ${i} ends before it starts`);
        }
        if (history[i + 1].start.getTime() !== end.getTime()) {
            throw new InvalidConfigError(`Phase history entry ${i + 1} does not start where entry ${i} ends`);
        }
    }
}

export function openEntry(history: PhaseHistory): PhaseHistoryEntry {
    const last = history[history.length - 1];
    if (last === undefined || last.end !== undefined) {
        throw new InvalidConfigError("Phase history has no open entry");
    }
    return last;
}

export function currentPhase(plant: Plant): GrowPhase {
    return openEntry(plant.phaseHistory).phase;
}

/**
 * Closes the open entry at `at` and opens one for `newPhase`.
 * Any phase may follow any other, including going backwards.
 */
export function changePhase(plant: Plant, newPhase: GrowPhase, at: Date, note?: string): Plant {
    assertValidDate(at, "Phase change time");
    const open = openEntry(plant.phaseHistory);

    if (open.phase === newPhase) {
        throw new InvalidTransitionError(`Plant ${plant.id} is already in ${phaseLabel(newPhase)}`);
    }
    if (at.getTime() < open.start.getTime()) {
        throw new InvalidTransitionError(
            `Phase change at ${at.toISOString()} precedes the start of ${phaseLabel(open.phase)} (${open.start.toISOString()})`,
        );
    }

    const closed: PhaseHistoryEntry = { ...open, end: at };
    const next: PhaseHistoryEntry = note === undefined ? { phase: newPhase, start: at } : { phase: newPhase, start: at, note };

    return {
        ...plant,
        phaseHistory: [...plant.phaseHistory.slice(0, -1), closed, next],
    };
}

function msInPhases(history: PhaseHistory, phases: readonly GrowPhase[], now: Date): number {
    let total = 0;
    for (const entry of history) {
        if (phases.includes(entry.phase)) {
            total += elapsedMs(entry.end ?? now, entry.start);
        }
    }
    return total;
}

export function daysInPhase(plant: Plant, phase: GrowPhase, now: Date): number {
    return toWholeDays(msInPhases(plant.phaseHistory, [phase], now));
}

export function daysInCurrentPhase(plant: Plant, now: Date): number {
    const open = openEntry(plant.phaseHistory);
    return toWholeDays(elapsedMs(now, open.start));
}

export function daysSincePlanted(plant: Plant, now: Date): number {
    return toWholeDays(elapsedMs(now, plant.plantedAt));
}

export function totalVegDays(plant: Plant, now: Date): number {
    return toWholeDays(msInPhases(plant.phaseHistory, VEG_PHASES, now));
}

export function totalFlowerDays(plant: Plant, now: Date): number {
    return toWholeDays(msInPhases(plant.phaseHistory, FLOWER_PHASES, now));
}

export function phaseBreakdown(plant: Plant, now: Date): Record<GrowPhase, number> {
    return {
        early_veg: daysInPhase(plant, "early_veg", now),
        mid_late_veg: daysInPhase(plant, "mid_late_veg", now),
        early_flower: daysInPhase(plant, "early_flower", now),
        mid_late_flower: daysInPhase(plant, "mid_late_flower", now),
        flushing: daysInPhase(plant, "flushing", now),
        done: daysInPhase(plant, "done", now),
    };
}

/**
 * Moves the planted date, which is also where the first phase entry starts.
 */
export function setPlantedDate(plant: Plant, plantedAt: Date): Plant {
    assertValidDate(plantedAt, "Planted date");
    const [first, ...rest] = plant.phaseHistory;
    if (first === undefined) {
        throw new InvalidConfigError(`Plant ${plant.id} has no phase history`);
    }
    if (first.end !== undefined && plantedAt.getTime() > first.end.getTime()) {
        throw new InvalidTransitionError(
            `Planted date ${plantedAt.toISOString()} is after the end of ${phaseLabel(first.phase)}`,
        );
    }

    return {
        ...plant,
        plantedAt,
        phaseHistory: [{ ...first, start: plantedAt }, ...rest],
    };
}
