import { phaseLabel } from "../components/GrowPhase";
import type { GrowPhase } from "../components/GrowPhase";
import type { Plant } from "../components/PlantState";
import type { IntegrationConfig } from "../config";
import { decodePlant, encodePlantOptions } from "../storage/codec";
import {
    changePhase,
    currentPhase,
    daysInCurrentPhase,
    daysSincePlanted,
    phaseBreakdown,
    setPlantedDate,
    totalFlowerDays,
    totalVegDays,
} from "../systems/PhaseHistorySystem";
import { addNote, renameStrain } from "../systems/PlantRecordSystem";
import {
    avgWaterPerSession,
    daysSinceLastWatering,
    frequencyPattern,
    lastWatering,
    logWatering,
    quickWater,
    setDefaultWaterVolume,
    waterThisWeek,
    wateringFrequency,
    wateringStatus,
} from "../systems/WateringSystem";
import type { FrequencyPattern, WateringStatus } from "../systems/WateringSystem";
import { Coordinator } from "./Coordinator";
import type { CoordinatorContext } from "./Coordinator";

export interface PlantSnapshot {
    plantId: string;
    name: string;
    strain: string;
    growboxId: string;
    plantedAt: Date;
    currentPhase: GrowPhase;
    daysSincePlanted: number;
    daysInCurrentPhase: number;
    phaseDays: Record<GrowPhase, number>;
    totalVegDays: number;
    totalFlowerDays: number;
    phaseHistoryEntries: number;
    defaultWaterVolumeMl: number;
    lastWatering: Date | undefined;
    daysSinceWatering: number | undefined;
    wateringStatus: WateringStatus;
    waterThisWeek: number;
    avgWaterPerSession: number | undefined;
    wateringFrequency: number | undefined;
    frequencyPattern: FrequencyPattern;
    totalWateringSessions: number;
}

export class PlantCoordinator extends Coordinator<PlantSnapshot> {
    public readonly plantId: string;
    public readonly plantName: string;
    public readonly growboxId: string;
    private readonly config: IntegrationConfig;

    constructor(entryId: string, context: CoordinatorContext, config: IntegrationConfig) {
        super(entryId, context, "PlantCoordinator");
        this.config = config;

        // Identity lives in the entry's fixed data, so it is safe to keep
        const plant = this.load();
        this.plantId = plant.id;
        this.plantName = plant.name;
        this.growboxId = plant.growboxId;
    }

    public load(): Plant {
        return decodePlant(this.readEntry(), this.config);
    }

    private mutate(apply: (plant: Plant, now: Date) => Plant): Plant {
        const next = apply(this.load(), this.clock.now());
        this.writeOptions(encodePlantOptions(next));
        this.refresh();
        return next;
    }

    public changePhase(newPhase: GrowPhase, note?: string): Plant {
        const previous = currentPhase(this.load());
        const plant = this.mutate((current, now) => changePhase(current, newPhase, now, note));
        this.logger.info(`Changed phase for ${plant.name}: ${phaseLabel(previous)} -> ${phaseLabel(newPhase)}`);
        return plant;
    }

    public logWatering(volumeMl: number, note?: string): Plant {
        const plant = this.mutate((current, now) =>
            logWatering(current, volumeMl, now, note, this.config.maxWaterVolumeMl),
        );
        this.logger.info(`Watered ${plant.name}: ${volumeMl} ml`);
        return plant;
    }

    public quickWater(): Plant {
        const plant = this.mutate((current, now) => quickWater(current, now, this.config.maxWaterVolumeMl));
        this.logger.info(`Quick watered ${plant.name}: ${plant.defaultWaterVolumeMl} ml`);
        return plant;
    }

    public addNote(note: string): Plant {
        const plant = this.mutate((current, now) => addNote(current, note, now));
        this.logger.info(`Added note to ${plant.name}`);
        return plant;
    }

    public setDefaultWaterVolume(volumeMl: number): Plant {
        const plant = this.mutate((current) =>
            setDefaultWaterVolume(
                current,
                volumeMl,
                this.config.minDefaultWaterVolumeMl,
                this.config.maxDefaultWaterVolumeMl,
            ),
        );
        this.logger.info(`Updated default water volume for ${plant.name}: ${volumeMl} ml`);
        return plant;
    }

    public setStrain(strain: string): Plant {
        const plant = this.mutate((current) => renameStrain(current, strain));
        this.logger.info(`Updated strain for ${plant.name}: ${plant.strain}`);
        return plant;
    }

    public setPlantedDate(plantedAt: Date): Plant {
        const plant = this.mutate((current) => setPlantedDate(current, plantedAt));
        this.logger.info(`Updated planted date for ${plant.name}: ${plantedAt.toISOString()}`);
        return plant;
    }

    protected computeSnapshot(): PlantSnapshot {
        const plant = this.load();
        const now = this.clock.now();
        const daysSinceWatering = daysSinceLastWatering(plant, now);
        const frequency = wateringFrequency(plant);

        const snapshot: PlantSnapshot = {
            plantId: plant.id,
            name: plant.name,
            strain: plant.strain,
            growboxId: plant.growboxId,
            plantedAt: plant.plantedAt,
            currentPhase: currentPhase(plant),
            daysSincePlanted: daysSincePlanted(plant, now),
            daysInCurrentPhase: daysInCurrentPhase(plant, now),
            phaseDays: phaseBreakdown(plant, now),
            totalVegDays: totalVegDays(plant, now),
            totalFlowerDays: totalFlowerDays(plant, now),
            phaseHistoryEntries: plant.phaseHistory.length,
            defaultWaterVolumeMl: plant.defaultWaterVolumeMl,
            lastWatering: lastWatering(plant),
            daysSinceWatering,
            wateringStatus: wateringStatus(daysSinceWatering, {
                dueSoonDays: this.config.wateringDueSoonDays,
                overdueDays: this.config.wateringOverdueDays,
            }),
            waterThisWeek: waterThisWeek(plant, now),
            avgWaterPerSession: avgWaterPerSession(plant),
            wateringFrequency: frequency,
            frequencyPattern: frequencyPattern(frequency),
            totalWateringSessions: plant.wateringLog.length,
        };

        this.logger.debug(
            `Refreshed ${plant.name}: ${snapshot.currentPhase} day ${snapshot.daysInCurrentPhase}, ${snapshot.totalWateringSessions} waterings`,
        );
        return snapshot;
    }
}
