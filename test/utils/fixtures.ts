import type { Plant } from "../../src/components/PlantState";
import { MS_PER_DAY } from "../../src/core/Clock";
import type { LogSink } from "../../src/core/Logger";
import type { StateReader } from "../../src/coordinators/GrowboxCoordinator";
import { startHistory } from "../../src/systems/PhaseHistorySystem";

export const T0 = new Date("2024-06-01T08:00:00.000Z");

export function day(n: number): Date {
    return new Date(T0.getTime() + n * MS_PER_DAY);
}

export function iso(date: Date): string {
    return date.toISOString();
}

export function makePlant(overrides: Partial<Plant> = {}): Plant {
    return {
        id: "test_plant_1",
        name: "Test Plant 1",
        strain: "Test Plant",
        plantedAt: T0,
        growboxId: "test_tent",
        defaultWaterVolumeMl: 500,
        phaseHistory: startHistory("early_veg", T0),
        wateringLog: [],
        notes: [],
        ...overrides,
    };
}

type Level = "debug" | "info" | "warn" | "error";

export class CapturingSink implements LogSink {
    public lines: Array<{ level: Level; message: string }> = [];

    public debug(message: string): void {
        this.lines.push({ level: "debug", message });
    }

    public info(message: string): void {
        this.lines.push({ level: "info", message });
    }

    public warn(message: string): void {
        this.lines.push({ level: "warn", message });
    }

    public error(message: string): void {
        this.lines.push({ level: "error", message });
    }

    public messages(level: Level): string[] {
        return this.lines.filter((line) => line.level === level).map((line) => line.message);
    }
}

/**
 * Host entity states backed by a plain map.
 */
export class MapStates implements StateReader {
    private states: Map<string, string>;

    constructor(initial: Record<string, string> = {}) {
        this.states = new Map(Object.entries(initial));
    }

    public set(entityId: string, state: string): void {
        this.states.set(entityId, state);
    }

    public getState(entityId: string): string | undefined {
        return this.states.get(entityId);
    }
}
