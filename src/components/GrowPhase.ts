import { UnknownPhaseError } from "../core/errors";

export const GROW_PHASES = [
    "early_veg",
    "mid_late_veg",
    "early_flower",
    "mid_late_flower",
    "flushing",
    "done",
] as const;

export type GrowPhase = (typeof GROW_PHASES)[number];

export type PhaseGroup = "veg" | "flower" | "finished";

interface PhaseInfo {
    label: string;
    icon: string;
    group: PhaseGroup;
}

export const PHASE_INFO: Record<GrowPhase, PhaseInfo> = {
    early_veg: { label: "Early Veg", icon: "mdi:sprout", group: "veg" },
    mid_late_veg: { label: "Mid Late Veg", icon: "mdi:leaf-circle", group: "veg" },
    early_flower: { label: "Early Flower", icon: "mdi:flower", group: "flower" },
    mid_late_flower: { label: "Mid Late Flower", icon: "mdi:flower-tulip-outline", group: "flower" },
    flushing: { label: "Flushing", icon: "mdi:water-sync", group: "flower" },
    done: { label: "Done", icon: "mdi:check-circle", group: "finished" },
};

export const VEG_PHASES: readonly GrowPhase[] = GROW_PHASES.filter((p) => PHASE_INFO[p].group === "veg");
export const FLOWER_PHASES: readonly GrowPhase[] = GROW_PHASES.filter((p) => PHASE_INFO[p].group === "flower");

// Earlier taxonomy split veg and flower into three stages each
export const LEGACY_PHASE_MAP: Readonly<Record<string, GrowPhase>> = {
    early_veg: "early_veg",
    mid_veg: "mid_late_veg",
    late_veg: "mid_late_veg",
    early_flower: "early_flower",
    mid_flower: "mid_late_flower",
    late_flower: "mid_late_flower",
    flushing: "flushing",
    done: "done",
};

export function isGrowPhase(value: string): value is GrowPhase {
    return GROW_PHASES.some((phase) => phase === value);
}

/**
 * Resolves a persisted phase name, current or legacy, to a current phase.
 */
export function migratePhase(name: string): GrowPhase {
    if (isGrowPhase(name)) return name;
    if (Object.prototype.hasOwnProperty.call(LEGACY_PHASE_MAP, name)) {
        return LEGACY_PHASE_MAP[name];
    }
    throw new UnknownPhaseError(name);
}

export function phaseLabel(phase: GrowPhase): string {
    return PHASE_INFO[phase].label;
}

export function phaseFromLabel(label: string): GrowPhase | undefined {
    return GROW_PHASES.find((p) => PHASE_INFO[p].label === label);
}
