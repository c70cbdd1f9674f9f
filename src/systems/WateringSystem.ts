import { subDays } from "date-fns";
import type { Plant, WateringEntry } from "../components/PlantState";
import { MS_PER_DAY, elapsedMs, toWholeDays } from "../core/Clock";
import { OutOfRangeError } from "../core/errors";

export const WATERING_WINDOW_DAYS = 7;

export type WateringStatus = "never_watered" | "good" | "due_soon" | "overdue";

export type FrequencyPattern =
    | "not_enough_data"
    | "multiple_times_daily"
    | "every_1_2_days"
    | "every_3_4_days"
    | "weekly_or_less";

export interface WateringThresholds {
    dueSoonDays: number;
    overdueDays: number;
}

function assertVolume(label: string, volumeMl: number, min: number, max: number): void {
    if (!Number.isInteger(volumeMl) || volumeMl < min || volumeMl > max) {
        throw new OutOfRangeError(label, volumeMl, min, max);
    }
}

export function logWatering(
    plant: Plant,
    volumeMl: number,
    at: Date,
    note: string | undefined,
    maxVolumeMl: number,
): Plant {
    assertVolume("Watering volume (ml)", volumeMl, 1, maxVolumeMl);

    const entry: WateringEntry = note === undefined ? { timestamp: at, volumeMl } : { timestamp: at, volumeMl, note };
    return { ...plant, wateringLog: [...plant.wateringLog, entry] };
}

export function quickWater(plant: Plant, at: Date, maxVolumeMl: number): Plant {
    return logWatering(plant, plant.defaultWaterVolumeMl, at, undefined, maxVolumeMl);
}

export function setDefaultWaterVolume(plant: Plant, volumeMl: number, minMl: number, maxMl: number): Plant {
    assertVolume("Default water volume (ml)", volumeMl, minMl, maxMl);
    return { ...plant, defaultWaterVolumeMl: volumeMl };
}

function sortedTimes(log: readonly WateringEntry[]): number[] {
    return log.map((entry) => entry.timestamp.getTime()).sort((a, b) => a - b);
}

export function lastWatering(plant: Plant): Date | undefined {
    const times = sortedTimes(plant.wateringLog);
    if (times.length === 0) return undefined;
    return new Date(times[times.length - 1]);
}

export function daysSinceLastWatering(plant: Plant, now: Date): number | undefined {
    const last = lastWatering(plant);
    if (last === undefined) return undefined;
    return toWholeDays(elapsedMs(now, last));
}

/**
 * Total volume over the trailing week, `(now - 7 days, now]`.
 */
export function waterThisWeek(plant: Plant, now: Date): number {
    const windowStart = subDays(now, WATERING_WINDOW_DAYS).getTime();
    const windowEnd = now.getTime();

    let total = 0;
    for (const entry of plant.wateringLog) {
        const t = entry.timestamp.getTime();
        if (t > windowStart && t <= windowEnd) {
            total += entry.volumeMl;
        }
    }
    return total;
}

export function avgWaterPerSession(plant: Plant): number | undefined {
    if (plant.wateringLog.length === 0) return undefined;
    const total = plant.wateringLog.reduce((sum, entry) => sum + entry.volumeMl, 0);
    return Math.round((total / plant.wateringLog.length) * 10) / 10;
}

/**
 * Mean gap between consecutive waterings, in days with one decimal.
 */
export function wateringFrequency(plant: Plant): number | undefined {
    const times = sortedTimes(plant.wateringLog);
    if (times.length < 2) return undefined;

    // Gaps telescope, so the mean is the full span over the gap count
    const meanMs = (times[times.length - 1] - times[0]) / (times.length - 1);
    return Math.round((meanMs / MS_PER_DAY) * 10) / 10;
}

export function wateringStatus(daysSince: number | undefined, thresholds: WateringThresholds): WateringStatus {
    if (daysSince === undefined) return "never_watered";
    if (daysSince > thresholds.overdueDays) return "overdue";
    if (daysSince > thresholds.dueSoonDays) return "due_soon";
    return "good";
}

export function frequencyPattern(frequencyDays: number | undefined): FrequencyPattern {
    if (frequencyDays === undefined) return "not_enough_data";
    if (frequencyDays < 1) return "multiple_times_daily";
    if (frequencyDays <= 2) return "every_1_2_days";
    if (frequencyDays <= 4) return "every_3_4_days";
    return "weekly_or_less";
}
