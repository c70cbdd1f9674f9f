export interface Growbox {
    readonly id: string;
    readonly name: string;
    // External sensors, referenced by the host's entity id only
    readonly temperatureSensor?: string;
    readonly humiditySensor?: string;
    readonly hygrostat?: string;
    readonly targetVpd: number;
}

export interface ClimateReading {
    temperature?: number;
    humidity?: number;
    vpd?: number;
    vpdStatus?: string;
    targetVpd: number;
    targetHumidity?: number;
}
