import { LabelRedefinitionError, UndefinedLabelError } from "../../src/assembler/AssemblerError.js";
import { LabelTable } from "../../src/assembler/LabelTable.js";
import { thrownBy } from "../util.js";

describe("GIVEN a label table", () => {
    describe("WHEN defining labels", () => {
        const table = new LabelTable();
        table.defineLabel("start", 0x100);
        table.defineLabel("loop", 0x104);

        test("THEN they should be found", () => {
            expect(table.lookup("start")).toEqual(0x100);
            expect(table.tryLookup("loop")).toEqual(0x104);
            expect(table.tryLookup("end")).toBeUndefined();
        });

        test("THEN unknown labels should fail on lookup", () => {
            expect(() => table.lookup("end")).toThrow(UndefinedLabelError);
        });

        test("THEN redefining at the same address should be a no-op", () => {
            table.defineLabel("start", 0x100);
            expect(table.getLabels().size).toEqual(2);
            expect(table.lookup("start")).toEqual(0x100);
        });

        test("THEN redefining at another address should fail", () => {
            const e = thrownBy(() => table.defineLabel("start", 0x108));
            expect(e).toBeInstanceOf(LabelRedefinitionError);
            expect(e).toMatchObject({ label: "start", previous: 0x100, address: 0x108 });
            expect(e).toHaveProperty("message", "Redefining label start from 0x00000100 to 0x00000108");
            expect(table.lookup("start")).toEqual(0x100);
        });
    });

    describe("WHEN seeded from another table", () => {
        const seed = new Map([["start", 0]]);
        const table = new LabelTable(seed);
        table.defineLabel("end", 8);

        test("THEN the seed should not be modified", () => {
            expect(seed.has("end")).toBe(false);
            expect(table.lookup("start")).toEqual(0);
        });
    });
});
