import { STRAIN_MAX_LENGTH, STRAIN_PATTERN } from "../components/PlantState";
import type { Plant } from "../components/PlantState";
import { InvalidConfigError } from "../core/errors";

export function addNote(plant: Plant, note: string, at: Date): Plant {
    const text = note.trim();
    if (text.length === 0) {
        throw new InvalidConfigError("Note must not be empty");
    }
    return { ...plant, notes: [...plant.notes, { timestamp: at, note: text }] };
}

export function validateStrain(strain: string): string {
    const trimmed = strain.trim();
    if (trimmed.length === 0 || trimmed.length > STRAIN_MAX_LENGTH || !STRAIN_PATTERN.test(trimmed)) {
        throw new InvalidConfigError(
            `Strain must be 1-${STRAIN_MAX_LENGTH} letters, digits, spaces, "-" or "_", got "${strain}"`,
        );
    }
    return trimmed;
}

export function renameStrain(plant: Plant, strain: string): Plant {
    return { ...plant, strain: validateStrain(strain) };
}
