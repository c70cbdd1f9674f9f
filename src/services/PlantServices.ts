import { z } from "zod";
import { isGrowPhase } from "../components/GrowPhase";
import type { Plant } from "../components/PlantState";
import type { PlantCoordinator } from "../coordinators/PlantCoordinator";
import { NotFoundError, UnknownPhaseError } from "../core/errors";
import type { Logger } from "../core/Logger";
import { parseOrThrow } from "../core/validation";

export const SERVICE_CHANGE_PHASE = "change_phase";
export const SERVICE_WATER_PLANT = "water_plant";
export const SERVICE_WATER_PLANT_QUICK = "water_plant_quick";
export const SERVICE_ADD_NOTE = "add_note";

export const SERVICE_NAMES = [
    SERVICE_CHANGE_PHASE,
    SERVICE_WATER_PLANT,
    SERVICE_WATER_PLANT_QUICK,
    SERVICE_ADD_NOTE,
] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

const plantId = z.string().min(1);

export const changePhaseSchema = z.object({
    plantId,
    newPhase: z.string().min(1),
    note: z.string().optional(),
});

export const waterPlantSchema = z.object({
    plantId,
    // Service UIs often send numbers as strings
    volumeMl: z.coerce.number(),
    note: z.string().optional(),
});

export const waterPlantQuickSchema = z.object({ plantId });

export const addNoteSchema = z.object({
    plantId,
    note: z.string(),
});

export type ChangePhaseCall = z.infer<typeof changePhaseSchema>;
export type WaterPlantCall = z.infer<typeof waterPlantSchema>;
export type WaterPlantQuickCall = z.infer<typeof waterPlantQuickSchema>;
export type AddNoteCall = z.infer<typeof addNoteSchema>;

export type ServiceHandler = (payload: unknown) => Plant;

export type PlantResolver = (plantId: string) => PlantCoordinator | undefined;

/**
 * Service-call handlers for the host to register. Each call resolves the
 * plant, applies one operation and returns the updated plant.
 */
export class PlantServices {
    private readonly resolve: PlantResolver;
    private readonly logger: Logger;

    constructor(resolve: PlantResolver, logger: Logger) {
        this.resolve = resolve;
        this.logger = logger.child("PlantServices");
    }

    private coordinatorFor(id: string): PlantCoordinator {
        const coordinator = this.resolve(id);
        if (!coordinator) {
            this.logger.error(`Plant ${id} not found`);
            throw new NotFoundError("Plant", id);
        }
        return coordinator;
    }

    public changePhase(call: ChangePhaseCall): Plant {
        if (!isGrowPhase(call.newPhase)) {
            throw new UnknownPhaseError(call.newPhase);
        }
        return this.coordinatorFor(call.plantId).changePhase(call.newPhase, call.note);
    }

    public waterPlant(call: WaterPlantCall): Plant {
        return this.coordinatorFor(call.plantId).logWatering(call.volumeMl, call.note);
    }

    public waterPlantQuick(call: WaterPlantQuickCall): Plant {
        return this.coordinatorFor(call.plantId).quickWater();
    }

    public addNote(call: AddNoteCall): Plant {
        return this.coordinatorFor(call.plantId).addNote(call.note);
    }

    public handlers(): Record<ServiceName, ServiceHandler> {
        return {
            [SERVICE_CHANGE_PHASE]: (payload) =>
                this.changePhase(parseOrThrow(changePhaseSchema, payload, `${SERVICE_CHANGE_PHASE} call`)),
            [SERVICE_WATER_PLANT]: (payload) =>
                this.waterPlant(parseOrThrow(waterPlantSchema, payload, `${SERVICE_WATER_PLANT} call`)),
            [SERVICE_WATER_PLANT_QUICK]: (payload) =>
                this.waterPlantQuick(parseOrThrow(waterPlantQuickSchema, payload, `${SERVICE_WATER_PLANT_QUICK} call`)),
            [SERVICE_ADD_NOTE]: (payload) =>
                this.addNote(parseOrThrow(addNoteSchema, payload, `${SERVICE_ADD_NOTE} call`)),
        };
    }

    public call(service: string, payload: unknown): Plant {
        const handlers = this.handlers();
        const name = SERVICE_NAMES.find((candidate) => candidate === service);
        if (name === undefined) {
            throw new NotFoundError("Service", service);
        }
        return handlers[name](payload);
    }
}
