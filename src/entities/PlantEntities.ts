import { GROW_PHASES, PHASE_INFO, phaseFromLabel, phaseLabel } from "../components/GrowPhase";
import type { GrowPhase } from "../components/GrowPhase";
import type { IntegrationConfig } from "../config";
import type { PlantCoordinator, PlantSnapshot } from "../coordinators/PlantCoordinator";
import { UnknownPhaseError } from "../core/errors";
import { Entity, EntityKind } from "../core/Registry";
import type { Attributes } from "../core/Registry";

export const UNIT_DAYS = "d";
export const UNIT_ML = "ml";

abstract class PlantEntity<V> extends Entity<V> {
    protected readonly coordinator: PlantCoordinator;
    private current: V | undefined;

    constructor(coordinator: PlantCoordinator, key: string, kind: EntityKind, label: string) {
        super(`plant_${coordinator.plantId}_${key}`, coordinator.entryId, kind, `${coordinator.plantName} ${label}`);
        this.coordinator = coordinator;
    }

    public value(): V | undefined {
        return this.current;
    }

    public update(): void {
        const data = this.coordinator.data;
        this.current = data === undefined ? undefined : this.read(data);
    }

    protected abstract read(data: PlantSnapshot): V | undefined;

    protected snapshotAttributes(build: (data: PlantSnapshot) => Attributes): Attributes {
        const data = this.coordinator.data;
        return data === undefined ? {} : build(data);
    }
}

export class DaysSincePlantedSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "days_since_planted", EntityKind.SENSOR, "Days Since Planted");
        this.icon = "mdi:calendar-range";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number {
        return data.daysSincePlanted;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            planted_at: data.plantedAt.toISOString(),
            growth_phase: data.currentPhase,
            strain: data.strain,
            total_veg_days: data.totalVegDays,
            total_flower_days: data.totalFlowerDays,
        }));
    }
}

export class DaysInCurrentPhaseSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "days_in_current_phase", EntityKind.SENSOR, "Days In Current Phase");
        this.icon = "mdi:calendar-clock";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number {
        return data.daysInCurrentPhase;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            current_phase: phaseLabel(data.currentPhase),
            current_phase_key: data.currentPhase,
            history_entries: data.phaseHistoryEntries,
            strain: data.strain,
        }));
    }
}

export class PhaseDaysSensor extends PlantEntity<number> {
    public readonly phase: GrowPhase;

    constructor(coordinator: PlantCoordinator, phase: GrowPhase) {
        super(coordinator, `days_in_${phase}`, EntityKind.SENSOR, `Days In ${phaseLabel(phase)}`);
        this.phase = phase;
        this.icon = PHASE_INFO[phase].icon;
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number {
        return data.phaseDays[this.phase];
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            phase: phaseLabel(this.phase),
            phase_key: this.phase,
            is_current_phase: data.currentPhase === this.phase,
        }));
    }
}

export class TotalVegDaysSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "total_veg_days", EntityKind.SENSOR, "Total Veg Days");
        this.icon = "mdi:leaf-circle";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number {
        return data.totalVegDays;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            early_veg_days: data.phaseDays.early_veg,
            mid_late_veg_days: data.phaseDays.mid_late_veg,
        }));
    }
}

export class TotalFlowerDaysSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "total_flower_days", EntityKind.SENSOR, "Total Flower Days");
        this.icon = "mdi:flower-circle";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number {
        return data.totalFlowerDays;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            early_flower_days: data.phaseDays.early_flower,
            mid_late_flower_days: data.phaseDays.mid_late_flower,
            flushing_days: data.phaseDays.flushing,
        }));
    }
}

export class LastWateringSensor extends PlantEntity<Date> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "last_watering", EntityKind.SENSOR, "Last Watering");
        this.icon = "mdi:water-clock";
    }

    protected read(data: PlantSnapshot): Date | undefined {
        return data.lastWatering;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({ total_sessions: data.totalWateringSessions }));
    }
}

export class DaysSinceWateringSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "days_since_watering", EntityKind.SENSOR, "Days Since Watering");
        this.icon = "mdi:water-alert";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number | undefined {
        return data.daysSinceWatering;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            status: data.wateringStatus,
            last_watering: data.lastWatering?.toISOString() ?? null,
        }));
    }
}

export class WaterThisWeekSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "water_this_week", EntityKind.SENSOR, "Water This Week");
        this.icon = "mdi:water";
        this.unit = UNIT_ML;
    }

    protected read(data: PlantSnapshot): number {
        return data.waterThisWeek;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({
            total_sessions: data.totalWateringSessions,
            avg_per_session: data.avgWaterPerSession ?? null,
        }));
    }
}

export class AvgWaterPerSessionSensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "avg_water_per_session", EntityKind.SENSOR, "Avg Water Per Session");
        this.icon = "mdi:cup-water";
        this.unit = UNIT_ML;
    }

    protected read(data: PlantSnapshot): number | undefined {
        return data.avgWaterPerSession;
    }
}

export class WateringFrequencySensor extends PlantEntity<number> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "watering_frequency", EntityKind.SENSOR, "Watering Frequency");
        this.icon = "mdi:calendar-sync";
        this.unit = UNIT_DAYS;
    }

    protected read(data: PlantSnapshot): number | undefined {
        return data.wateringFrequency;
    }

    public attributes(): Attributes {
        return this.snapshotAttributes((data) => ({ pattern: data.frequencyPattern }));
    }
}

export class DefaultWaterVolumeNumber extends PlantEntity<number> {
    public readonly min: number;
    public readonly max: number;
    public readonly step = 50;

    constructor(coordinator: PlantCoordinator, config: IntegrationConfig) {
        super(coordinator, "default_water_volume", EntityKind.NUMBER, "Default Water Volume");
        this.icon = "mdi:cup-water";
        this.unit = UNIT_ML;
        this.min = config.minDefaultWaterVolumeMl;
        this.max = config.maxDefaultWaterVolumeMl;
    }

    protected read(data: PlantSnapshot): number {
        return data.defaultWaterVolumeMl;
    }

    public setValue(volumeMl: number): void {
        this.coordinator.setDefaultWaterVolume(volumeMl);
    }
}

export class GrowthPhaseSelect extends PlantEntity<string> {
    public readonly options: readonly string[] = GROW_PHASES.map(phaseLabel);

    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "growth_phase", EntityKind.SELECT, "Growth Phase");
        this.icon = "mdi:sprout-outline";
    }

    protected read(data: PlantSnapshot): string {
        return phaseLabel(data.currentPhase);
    }

    public selectOption(option: string): void {
        const phase = phaseFromLabel(option);
        if (phase === undefined) {
            throw new UnknownPhaseError(option);
        }
        this.coordinator.changePhase(phase);
    }
}

export class QuickWaterButton extends PlantEntity<Date> {
    private lastPressed: Date | undefined;

    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "water_quick", EntityKind.BUTTON, "Quick Water");
        this.icon = "mdi:watering-can";
    }

    protected read(): Date | undefined {
        return this.lastPressed;
    }

    public press(): void {
        const plant = this.coordinator.quickWater();
        this.lastPressed = plant.wateringLog[plant.wateringLog.length - 1]?.timestamp;
        this.update();
    }
}

export class PlantedDateEntity extends PlantEntity<Date> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "planted_date", EntityKind.DATE, "Planted Date");
        this.icon = "mdi:calendar-plus";
    }

    protected read(data: PlantSnapshot): Date {
        return data.plantedAt;
    }

    public setValue(plantedAt: Date): void {
        this.coordinator.setPlantedDate(plantedAt);
    }
}

export class StrainText extends PlantEntity<string> {
    constructor(coordinator: PlantCoordinator) {
        super(coordinator, "strain", EntityKind.TEXT, "Strain");
        this.icon = "mdi:cannabis";
    }

    protected read(data: PlantSnapshot): string {
        return data.strain;
    }

    public setValue(strain: string): void {
        this.coordinator.setStrain(strain);
    }
}

export function createPlantEntities(coordinator: PlantCoordinator, config: IntegrationConfig): Entity[] {
    return [
        new DaysSincePlantedSensor(coordinator),
        new DaysInCurrentPhaseSensor(coordinator),
        ...GROW_PHASES.map((phase) => new PhaseDaysSensor(coordinator, phase)),
        new TotalVegDaysSensor(coordinator),
        new TotalFlowerDaysSensor(coordinator),
        new LastWateringSensor(coordinator),
        new DaysSinceWateringSensor(coordinator),
        new WaterThisWeekSensor(coordinator),
        new AvgWaterPerSessionSensor(coordinator),
        new WateringFrequencySensor(coordinator),
        new DefaultWaterVolumeNumber(coordinator, config),
        new GrowthPhaseSelect(coordinator),
        new QuickWaterButton(coordinator),
        new PlantedDateEntity(coordinator),
        new StrainText(coordinator),
    ];
}
