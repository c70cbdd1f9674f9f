import type { IntegrationConfig } from "../config";
import type { GrowboxCoordinator, GrowboxSnapshot } from "../coordinators/GrowboxCoordinator";
import { Entity, EntityKind } from "../core/Registry";
import type { Attributes } from "../core/Registry";
import { celsiusToFahrenheit } from "../systems/ClimateSystem";

export const UNIT_CELSIUS = "°C";
export const UNIT_PERCENT = "%";
export const UNIT_KPA = "kPa";

abstract class GrowboxEntity extends Entity<number> {
    protected readonly coordinator: GrowboxCoordinator;
    private current: number | undefined;

    constructor(coordinator: GrowboxCoordinator, key: string, kind: EntityKind, label: string) {
        super(`growbox_${coordinator.growboxId}_${key}`, coordinator.entryId, kind, `${coordinator.growboxName} ${label}`);
        this.coordinator = coordinator;
    }

    public value(): number | undefined {
        return this.current;
    }

    public update(): void {
        const data = this.coordinator.data;
        this.current = data === undefined ? undefined : this.read(data);
    }

    protected abstract read(data: GrowboxSnapshot): number | undefined;
}

export class TemperatureSensor extends GrowboxEntity {
    constructor(coordinator: GrowboxCoordinator) {
        super(coordinator, "temperature", EntityKind.SENSOR, "Temperature");
        this.icon = "mdi:thermometer";
        this.unit = UNIT_CELSIUS;
    }

    protected read(data: GrowboxSnapshot): number | undefined {
        return data.temperature;
    }

    public attributes(): Attributes {
        const temperature = this.coordinator.data?.temperature;
        if (temperature === undefined) return {};
        return { temperature_f: Math.round(celsiusToFahrenheit(temperature) * 10) / 10 };
    }
}

export class HumiditySensor extends GrowboxEntity {
    constructor(coordinator: GrowboxCoordinator) {
        super(coordinator, "humidity", EntityKind.SENSOR, "Humidity");
        this.icon = "mdi:water-percent";
        this.unit = UNIT_PERCENT;
    }

    protected read(data: GrowboxSnapshot): number | undefined {
        return data.humidity;
    }
}

export class VpdSensor extends GrowboxEntity {
    constructor(coordinator: GrowboxCoordinator) {
        super(coordinator, "vpd", EntityKind.SENSOR, "VPD");
        this.icon = "mdi:water-percent";
        this.unit = UNIT_KPA;
    }

    protected read(data: GrowboxSnapshot): number | undefined {
        return data.vpd;
    }

    public attributes(): Attributes {
        const data = this.coordinator.data;
        if (data === undefined || data.vpd === undefined) return {};
        return {
            status: data.vpdStatus ?? null,
            temperature: data.temperature ?? null,
            humidity: data.humidity ?? null,
            target_vpd: data.targetVpd,
            target_humidity: data.targetHumidity ?? null,
        };
    }
}

export class TargetHumiditySensor extends GrowboxEntity {
    constructor(coordinator: GrowboxCoordinator) {
        super(coordinator, "target_humidity", EntityKind.SENSOR, "Target Humidity");
        this.icon = "mdi:water-percent-alert";
        this.unit = UNIT_PERCENT;
    }

    protected read(data: GrowboxSnapshot): number | undefined {
        return data.targetHumidity;
    }

    public attributes(): Attributes {
        const data = this.coordinator.data;
        if (data === undefined) return {};
        const diff =
            data.targetHumidity !== undefined && data.humidity !== undefined
                ? Math.round((data.targetHumidity - data.humidity) * 10) / 10
                : null;
        return {
            target_vpd: data.targetVpd,
            current_humidity: data.humidity ?? null,
            humidity_diff: diff,
            hygrostat: data.hygrostat ?? null,
        };
    }
}

export class TargetVpdNumber extends GrowboxEntity {
    public readonly min: number;
    public readonly max: number;
    public readonly step = 0.1;

    constructor(coordinator: GrowboxCoordinator, config: IntegrationConfig) {
        super(coordinator, "target_vpd", EntityKind.NUMBER, "Target VPD");
        this.icon = "mdi:target";
        this.unit = UNIT_KPA;
        this.min = config.minTargetVpd;
        this.max = config.maxTargetVpd;
    }

    protected read(data: GrowboxSnapshot): number {
        return data.targetVpd;
    }

    public setValue(targetVpd: number): void {
        this.coordinator.setTargetVpd(targetVpd);
    }
}

export function createGrowboxEntities(coordinator: GrowboxCoordinator, config: IntegrationConfig): Entity[] {
    return [
        new TemperatureSensor(coordinator),
        new HumiditySensor(coordinator),
        new VpdSensor(coordinator),
        new TargetHumiditySensor(coordinator),
        new TargetVpdNumber(coordinator, config),
    ];
}
