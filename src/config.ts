import { z } from "zod";
import { parseOrThrow } from "./core/validation";

export const DOMAIN = "grow_journal";

export const integrationConfigSchema = z
    .object({
        maxWaterVolumeMl: z.number().int().positive().default(10000),
        defaultWaterVolumeMl: z.number().int().positive().default(500),
        minDefaultWaterVolumeMl: z.number().int().positive().default(100),
        maxDefaultWaterVolumeMl: z.number().int().positive().default(5000),
        wateringDueSoonDays: z.number().nonnegative().default(3),
        wateringOverdueDays: z.number().nonnegative().default(5),
        minTargetVpd: z.number().positive().default(0.4),
        maxTargetVpd: z.number().positive().default(2.0),
        defaultTargetVpd: z.number().positive().default(1.0),
    })
    .refine((c) => c.minDefaultWaterVolumeMl <= c.maxDefaultWaterVolumeMl, {
        message: "minDefaultWaterVolumeMl must not exceed maxDefaultWaterVolumeMl",
    })
    .refine((c) => c.maxDefaultWaterVolumeMl <= c.maxWaterVolumeMl, {
        message: "maxDefaultWaterVolumeMl must not exceed maxWaterVolumeMl",
    })
    .refine(
        (c) =>
            c.defaultWaterVolumeMl >= c.minDefaultWaterVolumeMl &&
            c.defaultWaterVolumeMl <= c.maxDefaultWaterVolumeMl,
        { message: "defaultWaterVolumeMl must lie within the default volume bounds" },
    )
    .refine((c) => c.wateringDueSoonDays <= c.wateringOverdueDays, {
        message: "wateringDueSoonDays must not exceed wateringOverdueDays",
    })
    .refine((c) => c.minTargetVpd <= c.defaultTargetVpd && c.defaultTargetVpd <= c.maxTargetVpd, {
        message: "defaultTargetVpd must lie within the target VPD bounds",
    });

export type IntegrationConfig = z.infer<typeof integrationConfigSchema>;

export function loadConfig(raw: unknown = {}): IntegrationConfig {
    return parseOrThrow(integrationConfigSchema, raw, "integration config");
}
