import { ManualClock } from "../src/core/Clock";
import { InvalidConfigError, NotFoundError, UnknownPhaseError, isGrowJournalError } from "../src/core/errors";
import type { Entity } from "../src/core/Registry";
import { GrowJournal } from "../src/GrowJournal";
import {
    GrowthPhaseSelect,
    PhaseDaysSensor,
    PlantedDateEntity,
    QuickWaterButton,
    StrainText,
} from "../src/entities/PlantEntities";
import { TargetVpdNumber, TemperatureSensor } from "../src/entities/GrowboxEntities";
import { MemoryEntryStore } from "../src/storage/EntryStore";
import { CapturingSink, MapStates, T0, day } from "./utils/fixtures";

function setup() {
    const store = new MemoryEntryStore();
    const states = new MapStates({ "sensor.tent_temp": "25", "sensor.tent_rh": "60" });
    const clock = new ManualClock(T0);
    const sink = new CapturingSink();
    const journal = new GrowJournal({ store, states, clock, logSink: sink });
    journal.createGrowbox({ name: "Main Tent", temperatureSensor: "sensor.tent_temp", humiditySensor: "sensor.tent_rh" });
    journal.createPlant({ strain: "Blue Dream", plantedAt: T0, growboxId: "main_tent" });
    return { store, states, clock, sink, journal };
}

function entityOf<T extends Entity>(journal: GrowJournal, id: string, type: new (...args: never[]) => T): T {
    const entity = journal.entity(id);
    if (!(entity instanceof type)) {
        throw new Error(`Expected ${id} to be a ${type.name}`);
    }
    return entity;
}

describe("GrowJournal", () => {
    it("registers entities for each entry", () => {
        const { sink, journal } = setup();

        expect(journal.registry.size).toBe(25);
        expect(journal.registry.getOwned("entry_1")).toHaveLength(5);
        expect(journal.registry.getOwned("entry_2")).toHaveLength(20);
        expect(sink.messages("info")).toEqual([
            "[GrowJournal] Set up growbox Main Tent with 5 entities",
            "[GrowJournal] Set up plant Blue Dream 1 with 20 entities",
        ]);
    });

    it("names entities after the plant", () => {
        const { journal } = setup();
        const sensor = entityOf(journal, "plant_blue_dream_1_days_in_early_veg", PhaseDaysSensor);

        expect(sensor.name).toBe("Blue Dream 1 Days In Early Veg");
        expect(sensor.unit).toBe("d");
        expect(sensor.attributes()).toEqual({ phase: "Early Veg", phase_key: "early_veg", is_current_phase: true });
    });

    it("advances day counters on refresh", () => {
        const { clock, journal } = setup();
        expect(journal.entity("plant_blue_dream_1_days_since_planted")?.value()).toBe(0);

        clock.advanceDays(15);
        journal.refresh();
        expect(journal.entity("plant_blue_dream_1_days_since_planted")?.value()).toBe(15);
    });

    it("updates entities straight after a service call", () => {
        const { journal } = setup();
        journal.services.call("water_plant", { plantId: "blue_dream_1", volumeMl: 1200 });

        expect(journal.entity("plant_blue_dream_1_water_this_week")?.value()).toBe(1200);
        expect(journal.entity("plant_blue_dream_1_days_since_watering")?.attributes()).toEqual({
            status: "good",
            last_watering: "2024-06-01T08:00:00.000Z",
        });
    });

    it("changes phase through the select entity", () => {
        const { clock, journal } = setup();
        const select = entityOf(journal, "plant_blue_dream_1_growth_phase", GrowthPhaseSelect);
        expect(select.value()).toBe("Early Veg");

        clock.advanceDays(10);
        select.selectOption("Mid Late Veg");

        expect(select.value()).toBe("Mid Late Veg");
        expect(journal.entity("plant_blue_dream_1_days_in_early_veg")?.value()).toBe(10);
        expect(() => select.selectOption("Seedling")).toThrow(UnknownPhaseError);
    });

    it("records the quick-water press time", () => {
        const { clock, journal } = setup();
        const button = entityOf(journal, "plant_blue_dream_1_water_quick", QuickWaterButton);

        clock.advanceDays(1);
        button.press();

        expect(button.value()).toEqual(day(1));
        expect(journal.entity("plant_blue_dream_1_last_watering")?.value()).toEqual(day(1));
    });

    it("edits the strain through the text entity", () => {
        const { journal } = setup();
        entityOf(journal, "plant_blue_dream_1_strain", StrainText).setValue("Northern Lights");
        expect(journal.entity("plant_blue_dream_1_strain")?.value()).toBe("Northern Lights");
    });

    it("follows sensor readings for the growbox", () => {
        const { states, journal } = setup();
        expect(journal.entity("growbox_main_tent_vpd")?.value()).toBe(1.27);
        expect(journal.entity("growbox_main_tent_vpd")?.attributes()).toEqual({
            status: "good",
            temperature: 25,
            humidity: 60,
            target_vpd: 1.0,
            target_humidity: 68.4,
        });

        states.set("sensor.tent_rh", "unavailable");
        journal.refresh();
        expect(journal.entity("growbox_main_tent_vpd")?.value()).toBeUndefined();
        expect(journal.entity("growbox_main_tent_humidity")?.value()).toBeUndefined();
    });

    it("sets the target VPD through the number entity", () => {
        const { journal } = setup();
        entityOf(journal, "growbox_main_tent_target_vpd", TargetVpdNumber).setValue(1.2);
        expect(journal.entity("growbox_main_tent_target_humidity")?.value()).toBe(62.1);
    });

    it("numbers plants of the same strain", () => {
        const { journal } = setup();
        journal.createPlant({ strain: "Blue Dream", plantedAt: T0, growboxId: "main_tent" });

        expect(journal.getPlant("blue_dream_2")?.plantName).toBe("Blue Dream 2");
        expect(journal.plantsInGrowbox("main_tent").map((plant) => plant.plantId)).toEqual([
            "blue_dream_1",
            "blue_dream_2",
        ]);
    });

    it("keeps plant ids unique when strains differ only in case", () => {
        const { store, journal } = setup();
        const entry = journal.createPlant({ strain: "blue dream", plantedAt: T0, growboxId: "main_tent" });

        expect(entry.data["plantId"]).toBe("blue_dream_2");
        expect(store.entries().map((stored) => stored.data["plantId"])).toEqual([undefined, "blue_dream_1", "blue_dream_2"]);
        expect(journal.getPlant("blue_dream_1")?.entryId).toBe("entry_2");
        expect(journal.getPlant("blue_dream_2")?.entryId).toBe("entry_3");
        expect(journal.registry.getOwned("entry_3")).toHaveLength(20);
        expect(journal.registry.size).toBe(45);
    });

    it("refuses a stored plant whose id is already loaded", () => {
        const { store, sink, journal } = setup();
        const original = store.get("entry_2");
        if (!original) throw new Error("entry_2 missing");
        const copy = store.add({ title: original.title, data: original.data, options: original.options });

        expect(journal.setupEntry(copy.entryId)).toBe(false);
        expect(journal.registry.getOwned(copy.entryId)).toEqual([]);
        expect(journal.registry.size).toBe(25);
        expect(journal.getPlant("blue_dream_1")?.entryId).toBe("entry_2");
        expect(sink.messages("error")).toEqual([
            "[GrowJournal] Failed to set up entry entry_3: Plant id blue_dream_1 is already used by entry entry_2",
        ]);
    });

    it("drops a half set-up entry when loading fails unexpectedly", () => {
        const journal = new GrowJournal({
            store: new MemoryEntryStore(),
            states: {
                getState: () => {
                    throw new Error("state machine offline");
                },
            },
            clock: new ManualClock(T0),
            logSink: new CapturingSink(),
        });

        expect(() => journal.createGrowbox({ name: "Main Tent", temperatureSensor: "sensor.tent_temp" })).toThrow(
            "state machine offline",
        );
        expect(journal.getGrowbox("main_tent")).toBeUndefined();
        expect(journal.registry.size).toBe(0);
        expect(journal.registry.getOwned("entry_1")).toEqual([]);
    });

    it("rejects an invalid planted date from the date entity", () => {
        const { journal } = setup();
        const planted = entityOf(journal, "plant_blue_dream_1_planted_date", PlantedDateEntity);

        let caught: unknown;
        try {
            planted.setValue(new Date("not a date"));
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(InvalidConfigError);
        expect(isGrowJournalError(caught)).toBe(true);
        expect(planted.value()).toEqual(T0);
    });

    it("reports the temperature in Fahrenheit as an attribute", () => {
        const { states, journal } = setup();
        const sensor = entityOf(journal, "growbox_main_tent_temperature", TemperatureSensor);
        expect(sensor.attributes()).toEqual({ temperature_f: 77 });

        states.set("sensor.tent_temp", "unavailable");
        journal.refresh();
        expect(sensor.attributes()).toEqual({});
    });

    it("refuses a plant for an unknown growbox", () => {
        const { store, journal } = setup();
        expect(() => journal.createPlant({ strain: "Blue Dream", plantedAt: T0, growboxId: "garage" })).toThrow(
            NotFoundError,
        );
        expect(store.entries()).toHaveLength(2);
    });

    it("unloads and removes entries", () => {
        const { store, journal } = setup();

        expect(journal.unloadEntry("entry_2")).toBe(true);
        expect(journal.registry.size).toBe(5);
        expect(journal.getPlant("blue_dream_1")).toBeUndefined();
        expect(journal.unloadEntry("entry_2")).toBe(false);

        expect(journal.removeEntry("entry_1")).toBe(true);
        expect(journal.registry.size).toBe(0);
        expect(store.entries().map((entry) => entry.entryId)).toEqual(["entry_2"]);
    });

    it("warns when an entry is set up twice", () => {
        const { sink, journal } = setup();
        expect(journal.setupEntry("entry_1")).toBe(false);
        expect(sink.messages("warn")).toEqual(["[GrowJournal] Entry entry_1 is already set up"]);
    });

    it("skips entries it cannot load", () => {
        const { store, sink, journal } = setup();
        const broken = store.add({
            title: "Broken",
            data: { kind: "plant", plantId: "broken", name: "Broken", growboxId: "main_tent" },
            options: { plantedAt: "not a date" },
        });
        const foreign = store.add({ title: "Foreign", data: { kind: "light" }, options: {} });

        expect(journal.setupEntry(broken.entryId)).toBe(false);
        expect(journal.setupEntry(foreign.entryId)).toBe(false);
        expect(journal.setupEntry("entry_99")).toBe(false);
        expect(journal.registry.getOwned(broken.entryId)).toEqual([]);
        expect(sink.messages("error")).toEqual([
            "[GrowJournal] Failed to set up entry entry_3: Invalid plant entry entry_3 options: plantedAt: expected an ISO-8601 timestamp",
            "[GrowJournal] Unknown device type in entry entry_4",
            "[GrowJournal] Entry entry_99 not found",
        ]);
    });

    it("sets up everything already stored", () => {
        const { store } = setup();
        const restarted = new GrowJournal({
            store,
            states: new MapStates(),
            clock: new ManualClock(day(3)),
            logSink: new CapturingSink(),
        });

        expect(restarted.setupAll()).toBe(2);
        expect(restarted.entity("plant_blue_dream_1_days_since_planted")?.value()).toBe(3);
    });

    it("applies integration config limits", () => {
        const journal = new GrowJournal({
            store: new MemoryEntryStore(),
            states: new MapStates(),
            clock: new ManualClock(T0),
            logSink: new CapturingSink(),
            config: { maxWaterVolumeMl: 5000 },
        });
        journal.createGrowbox({ name: "Main Tent" });
        journal.createPlant({ strain: "Blue Dream", plantedAt: T0, growboxId: "main_tent" });

        expect(() => journal.services.call("water_plant", { plantId: "blue_dream_1", volumeMl: 6000 })).toThrow(
            "Watering volume (ml) must be between 1 and 5000, got 6000",
        );
    });
});
