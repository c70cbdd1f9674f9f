export type VpdStatus = "too_low" | "optimal" | "good" | "too_high";

export const TARGET_HUMIDITY_MIN = 30;
export const TARGET_HUMIDITY_MAX = 90;

function round(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

/**
 * Saturated vapour pressure in kPa (Magnus formula).
 */
export function saturatedVaporPressure(temperatureC: number): number {
    return 0.6108 * Math.exp((17.27 * temperatureC) / (temperatureC + 237.3));
}

/**
 * Vapour pressure deficit in kPa, two decimals.
 */
export function calculateVpd(temperatureC: number, humidityPct: number): number {
    const svp = saturatedVaporPressure(temperatureC);
    return round(svp * (1 - humidityPct / 100), 2);
}

export function vpdStatus(vpd: number): VpdStatus {
    if (vpd < 0.5) return "too_low";
    if (vpd > 1.5) return "too_high";
    if (vpd >= 0.8 && vpd <= 1.2) return "optimal";
    return "good";
}

/**
 * Relative humidity that would give `targetVpd` at this temperature,
 * clamped to what a hygrostat can sensibly hold.
 */
export function targetHumidity(temperatureC: number, targetVpd: number): number {
    const svp = saturatedVaporPressure(temperatureC);
    const humidity = (1 - targetVpd / svp) * 100;
    return round(Math.max(TARGET_HUMIDITY_MIN, Math.min(TARGET_HUMIDITY_MAX, humidity)), 1);
}

export function celsiusToFahrenheit(celsius: number): number {
    return (celsius * 9) / 5 + 32;
}
