import type { ClimateReading, Growbox } from "../components/GrowboxState";
import type { IntegrationConfig } from "../config";
import { OutOfRangeError } from "../core/errors";
import { decodeGrowbox, encodeGrowboxOptions } from "../storage/codec";
import { calculateVpd, targetHumidity, vpdStatus } from "../systems/ClimateSystem";
import { Coordinator } from "./Coordinator";
import type { CoordinatorContext } from "./Coordinator";

/**
 * Read access to the host's current entity states.
 */
export interface StateReader {
    getState(entityId: string): string | undefined;
}

export interface GrowboxSensors {
    temperatureSensor?: string;
    humiditySensor?: string;
    hygrostat?: string;
}

const UNAVAILABLE_STATES = new Set(["unknown", "unavailable", ""]);

export function readNumericState(states: StateReader, entityId: string | undefined): number | undefined {
    if (entityId === undefined) return undefined;
    const raw = states.getState(entityId);
    if (raw === undefined || UNAVAILABLE_STATES.has(raw.trim().toLowerCase())) return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
}

export interface GrowboxSnapshot extends ClimateReading {
    growboxId: string;
    name: string;
    hygrostat: string | undefined;
}

export class GrowboxCoordinator extends Coordinator<GrowboxSnapshot> {
    public readonly growboxId: string;
    public readonly growboxName: string;
    private readonly states: StateReader;
    private readonly config: IntegrationConfig;

    constructor(entryId: string, context: CoordinatorContext, states: StateReader, config: IntegrationConfig) {
        super(entryId, context, "GrowboxCoordinator");
        this.states = states;
        this.config = config;
        const growbox = this.load();
        this.growboxId = growbox.id;
        this.growboxName = growbox.name;
    }

    public load(): Growbox {
        return decodeGrowbox(this.readEntry(), this.config);
    }

    public setTargetVpd(targetVpd: number): Growbox {
        const { minTargetVpd, maxTargetVpd } = this.config;
        if (!Number.isFinite(targetVpd) || targetVpd < minTargetVpd || targetVpd > maxTargetVpd) {
            throw new OutOfRangeError("Target VPD (kPa)", targetVpd, minTargetVpd, maxTargetVpd);
        }
        const growbox: Growbox = { ...this.load(), targetVpd };
        this.writeOptions(encodeGrowboxOptions(growbox));
        this.refresh();
        this.logger.info(`Set target VPD for ${growbox.name}: ${targetVpd} kPa`);
        return growbox;
    }

    /**
     * Re-points the sensor references. A key that is present but undefined clears it.
     */
    public setSensors(sensors: GrowboxSensors): Growbox {
        const current = this.load();
        const growbox: Growbox = {
            ...current,
            temperatureSensor: "temperatureSensor" in sensors ? sensors.temperatureSensor : current.temperatureSensor,
            humiditySensor: "humiditySensor" in sensors ? sensors.humiditySensor : current.humiditySensor,
            hygrostat: "hygrostat" in sensors ? sensors.hygrostat : current.hygrostat,
        };
        // Whole-blob write: cleared sensors must not survive from the old options
        const entry = this.readEntry();
        const options = { ...entry.options };
        delete options["temperatureSensor"];
        delete options["humiditySensor"];
        delete options["hygrostat"];
        this.store.updateOptions(this.entryId, { ...options, ...encodeGrowboxOptions(growbox) });
        this.refresh();
        this.logger.info(`Updated sensors for ${growbox.name}`);
        return growbox;
    }

    protected computeSnapshot(): GrowboxSnapshot {
        const growbox = this.load();
        const temperature = readNumericState(this.states, growbox.temperatureSensor);
        const humidity = readNumericState(this.states, growbox.humiditySensor);

        const snapshot: GrowboxSnapshot = {
            growboxId: growbox.id,
            name: growbox.name,
            hygrostat: growbox.hygrostat,
            temperature,
            humidity,
            targetVpd: growbox.targetVpd,
        };

        if (temperature !== undefined) {
            snapshot.targetHumidity = targetHumidity(temperature, growbox.targetVpd);
            if (humidity !== undefined) {
                snapshot.vpd = calculateVpd(temperature, humidity);
                snapshot.vpdStatus = vpdStatus(snapshot.vpd);
            }
        }

        this.logger.debug(
            `Refreshed ${growbox.name}: T=${temperature ?? "n/a"} RH=${humidity ?? "n/a"} VPD=${snapshot.vpd ?? "n/a"}`,
        );
        return snapshot;
    }
}
