import { GROW_PHASES } from "../src/components/GrowPhase";
import { InvalidConfigError, InvalidTransitionError } from "../src/core/errors";
import {
    changePhase,
    currentPhase,
    daysInCurrentPhase,
    daysInPhase,
    daysSincePlanted,
    phaseBreakdown,
    setPlantedDate,
    startHistory,
    totalFlowerDays,
    totalVegDays,
    validateHistory,
} from "../src/systems/PhaseHistorySystem";
import { T0, day, makePlant } from "./utils/fixtures";

describe("phase history", () => {
    it("tracks days per phase across a transition", () => {
        const plant = changePhase(makePlant(), "mid_late_veg", day(10), "switched light cycle");

        expect(daysInPhase(plant, "early_veg", day(15))).toBe(10);
        expect(daysInPhase(plant, "mid_late_veg", day(15))).toBe(5);
        expect(daysSincePlanted(plant, day(15))).toBe(15);
        expect(daysInCurrentPhase(plant, day(15))).toBe(5);
        expect(currentPhase(plant)).toBe("mid_late_veg");
    });

    it("closes the open entry and opens exactly one new one", () => {
        const plant = changePhase(makePlant(), "mid_late_veg", day(10), "topped");

        expect(plant.phaseHistory).toEqual([
            { phase: "early_veg", start: T0, end: day(10) },
            { phase: "mid_late_veg", start: day(10), note: "topped" },
        ]);
        expect(plant.phaseHistory.filter((entry) => entry.end === undefined)).toHaveLength(1);
    });

    it("leaves the input plant untouched", () => {
        const planted = makePlant();
        changePhase(planted, "early_flower", day(3));

        expect(planted.phaseHistory).toHaveLength(1);
        expect(currentPhase(planted)).toBe("early_veg");
    });

    it("rejects a change to the current phase", () => {
        expect(() => changePhase(makePlant(), "early_veg", day(1))).toThrow(InvalidTransitionError);
        expect(() => changePhase(makePlant(), "early_veg", day(1))).toThrow(
            "Plant test_plant_1 is already in Early Veg",
        );
    });

    it("rejects a change dated before the current phase began", () => {
        const plant = changePhase(makePlant(), "mid_late_veg", day(10));
        expect(() => changePhase(plant, "early_flower", day(9))).toThrow(InvalidTransitionError);
    });

    it("rejects an invalid change time", () => {
        expect(() => changePhase(makePlant(), "mid_late_veg", new Date("not a date"))).toThrow(
            "Phase change time is not a valid date",
        );
    });

    it("allows going back to an earlier phase", () => {
        let plant = changePhase(makePlant(), "early_flower", day(4));
        plant = changePhase(plant, "early_veg", day(6));

        expect(daysInPhase(plant, "early_veg", day(9))).toBe(7);
        expect(daysInPhase(plant, "early_flower", day(9))).toBe(2);
    });

    it("sums veg and flower groups", () => {
        let plant = changePhase(makePlant(), "mid_late_veg", day(10));
        plant = changePhase(plant, "early_flower", day(15));
        plant = changePhase(plant, "mid_late_flower", day(30));
        plant = changePhase(plant, "flushing", day(50));
        plant = changePhase(plant, "done", day(60));

        expect(totalVegDays(plant, day(65))).toBe(15);
        expect(totalFlowerDays(plant, day(65))).toBe(45);
        expect(daysInPhase(plant, "done", day(65))).toBe(5);
    });

    it("breaks down every phase and adds up to the days since planting", () => {
        let plant = changePhase(makePlant(), "mid_late_veg", day(10));
        plant = changePhase(plant, "early_flower", day(15));

        const breakdown = phaseBreakdown(plant, day(20));
        expect(breakdown).toEqual({
            early_veg: 10,
            mid_late_veg: 5,
            early_flower: 5,
            mid_late_flower: 0,
            flushing: 0,
            done: 0,
        });
        const total = Object.values(breakdown).reduce((sum, days) => sum + days, 0);
        expect(total).toBe(daysSincePlanted(plant, day(20)));
    });

    it("counts whole days only", () => {
        const plant = makePlant();
        const almostTwoDays = new Date(day(2).getTime() - 1);

        expect(daysSincePlanted(plant, almostTwoDays)).toBe(1);
        expect(daysInPhase(plant, "early_veg", almostTwoDays)).toBe(1);
    });

    it("keeps one open, contiguous entry through a long run of changes", () => {
        let plant = makePlant();
        let rejected = 0;

        // Odd steps retry the current phase; even steps move one phase back, wrapping to done
        for (let step = 1; step <= 40; step++) {
            const target = GROW_PHASES[(Math.floor(step / 2) * 5) % GROW_PHASES.length];
            if (target === currentPhase(plant)) {
                const before = plant;
                expect(() => changePhase(before, target, day(step))).toThrow(InvalidTransitionError);
                rejected++;
            } else {
                plant = changePhase(plant, target, day(step));
            }

            const history = plant.phaseHistory;
            expect(history.filter((entry) => entry.end === undefined)).toHaveLength(1);
            expect(history[history.length - 1].end).toBeUndefined();
            for (let i = 0; i < history.length - 1; i++) {
                expect(history[i].end).toEqual(history[i + 1].start);
            }
            expect(() => validateHistory(history, plant.plantedAt)).not.toThrow();

            const total = Object.values(phaseBreakdown(plant, day(step))).reduce((sum, days) => sum + days, 0);
            expect(total).toBe(daysSincePlanted(plant, day(step)));
        }

        expect(rejected).toBe(20);
        expect(plant.phaseHistory).toHaveLength(21);
        expect(currentPhase(plant)).toBe("flushing");
    });

    it("reports zero for a clock behind the planted date", () => {
        expect(daysSincePlanted(makePlant(), day(-3))).toBe(0);
        expect(daysInCurrentPhase(makePlant(), day(-3))).toBe(0);
    });

    describe("validateHistory", () => {
        it("accepts a contiguous history ending in one open entry", () => {
            const plant = changePhase(makePlant(), "mid_late_veg", day(10));
            expect(() => validateHistory(plant.phaseHistory)).not.toThrow();
        });

        it("rejects an empty history", () => {
            expect(() => validateHistory([])).toThrow(InvalidConfigError);
        });

        it("rejects a closed last entry", () => {
            expect(() => validateHistory([{ phase: "early_veg", start: T0, end: day(1) }])).toThrow(
                "Last phase history entry must be open",
            );
        });

        it("rejects an open entry that is not last", () => {
            expect(() =>
                validateHistory([
                    { phase: "early_veg", start: T0 },
                    { phase: "mid_late_veg", start: day(2) },
                ]),
            ).toThrow("Phase history entry 0 is open but not last");
        });

        it("rejects a first entry that does not start at the planted date", () => {
            expect(() => validateHistory(startHistory("early_veg", day(3)), T0)).toThrow(
                "Phase history starts at 2024-06-04T08:00:00.000Z, not at the planted date 2024-06-01T08:00:00.000Z",
            );
            expect(() => validateHistory(startHistory("early_veg", T0), T0)).not.toThrow();
        });

        it("rejects a gap between entries", () => {
            expect(() =>
                validateHistory([
                    { phase: "early_veg", start: T0, end: day(2) },
                    { phase: "mid_late_veg", start: day(3) },
                ]),
            ).toThrow("Phase history entry 1 does not start where entry 0 ends");
        });
    });

    describe("setPlantedDate", () => {
        it("moves the planted date and the first entry's start together", () => {
            const plant = setPlantedDate(changePhase(makePlant(), "mid_late_veg", day(10)), day(-2));

            expect(plant.plantedAt).toEqual(day(-2));
            expect(plant.phaseHistory[0].start).toEqual(day(-2));
            expect(daysInPhase(plant, "early_veg", day(15))).toBe(12);
        });

        it("rejects a date after the first phase ended", () => {
            const plant = changePhase(makePlant(), "mid_late_veg", day(10));
            expect(() => setPlantedDate(plant, day(11))).toThrow(InvalidTransitionError);
        });

        it("rejects an invalid date", () => {
            expect(() => setPlantedDate(makePlant(), new Date("not a date"))).toThrow(InvalidConfigError);
        });

        it("accepts any date while the first phase is still open", () => {
            const plant = setPlantedDate(makePlant(), day(5));
            expect(plant.phaseHistory).toEqual(startHistory("early_veg", day(5)));
        });
    });
});
