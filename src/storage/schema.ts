import { isValid, parseISO } from "date-fns";
import { z } from "zod";

const timestamp = z.string().refine((value) => isValid(parseISO(value)), {
    message: "expected an ISO-8601 timestamp",
});

// Hosts store cleared entity pickers as "", "none" or null
const entityRef = z
    .string()
    .nullish()
    .transform((value) => {
        const trimmed = value?.trim();
        if (!trimmed || trimmed.toLowerCase() === "none") return undefined;
        return trimmed;
    });

export const entryKindSchema = z.object({
    kind: z.enum(["plant", "growbox"]),
});

export const plantDataSchema = z.object({
    kind: z.literal("plant"),
    plantId: z.string().min(1),
    name: z.string().min(1),
    growboxId: z.string().min(1),
});

export const phaseEntrySchema = z.object({
    phase: z.string().min(1),
    start: timestamp,
    end: timestamp.optional(),
    note: z.string().optional(),
});

export const wateringEntrySchema = z.object({
    timestamp,
    volumeMl: z.number().int().positive(),
    note: z.string().optional(),
});

export const plantNoteSchema = z.object({
    timestamp,
    note: z.string(),
});

export const plantOptionsSchema = z.object({
    strain: z.string().default("Unknown"),
    plantedAt: timestamp,
    defaultWaterVolumeMl: z.number().int().positive().optional(),
    // Entries written before history tracking only carry the current stage
    growthStage: z.string().optional(),
    phaseHistory: z.array(phaseEntrySchema).default([]),
    wateringLog: z.array(wateringEntrySchema).default([]),
    notes: z.array(plantNoteSchema).default([]),
});

export const growboxDataSchema = z.object({
    kind: z.literal("growbox"),
    growboxId: z.string().min(1),
    name: z.string().min(1),
});

export const growboxOptionsSchema = z.object({
    temperatureSensor: entityRef,
    humiditySensor: entityRef,
    hygrostat: entityRef,
    targetVpd: z.number().positive().optional(),
});

export type PhaseEntryRecord = z.input<typeof phaseEntrySchema>;
export type WateringEntryRecord = z.input<typeof wateringEntrySchema>;
export type PlantNoteRecord = z.input<typeof plantNoteSchema>;
