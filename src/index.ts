export { GrowJournal } from "./GrowJournal";
export type { HostContext } from "./GrowJournal";
export { DOMAIN, integrationConfigSchema, loadConfig } from "./config";
export type { IntegrationConfig } from "./config";

export * from "./core/errors";
export { Logger } from "./core/Logger";
export type { LogSink } from "./core/Logger";
export { MS_PER_DAY, ManualClock, SystemClock } from "./core/Clock";
export type { Clock } from "./core/Clock";
export { Entity, EntityKind, EntityRegistry } from "./core/Registry";
export type { Attributes, EntityID, OwnerID } from "./core/Registry";

export * from "./components/GrowPhase";
export type { Plant, PhaseHistoryEntry, PlantNote, WateringEntry } from "./components/PlantState";
export type { ClimateReading, Growbox } from "./components/GrowboxState";

export * from "./systems/PhaseHistorySystem";
export * from "./systems/WateringSystem";
export * from "./systems/ClimateSystem";
export * from "./systems/PlantRecordSystem";

export { MemoryEntryStore } from "./storage/EntryStore";
export type { ConfigEntry, EntryDraft, EntryOptions, EntryStore } from "./storage/EntryStore";
export { decodeGrowbox, decodePlant, encodeGrowboxOptions, encodePlantOptions } from "./storage/codec";
export { createGrowboxDraft, createPlantDraft, generatePlantName, slugify } from "./storage/entries";
export type { NewGrowbox, NewPlant } from "./storage/entries";

export { PlantCoordinator } from "./coordinators/PlantCoordinator";
export type { PlantSnapshot } from "./coordinators/PlantCoordinator";
export { GrowboxCoordinator, readNumericState } from "./coordinators/GrowboxCoordinator";
export type { GrowboxSensors, GrowboxSnapshot, StateReader } from "./coordinators/GrowboxCoordinator";

export * from "./entities/PlantEntities";
export * from "./entities/GrowboxEntities";
export * from "./services/PlantServices";
