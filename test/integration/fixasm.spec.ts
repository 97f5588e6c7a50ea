import { Fixasm, UnknownMnemonicError } from "../../src/index.js";
import { toWords } from "../util.js";

describe("GIVEN an assembly listing", () => {
    const listing = "lbl entry\nset2 r1, r0, 0x1234\nset3 r1, r1, 0x5678\njump entry";

    describe("WHEN assembled by the front end", () => {
        const out = new Fixasm({ base: 0x8000 }).run("test.s", listing);

        test("THEN it should produce the binary and labels", () => {
            expect(out.errors.length).toBe(0);
            expect(toWords(out.binary)).toEqual([0x24011234, 0x20215678, 0x94FFFFFF]);
            expect(out.labels).toEqual(new Map([["entry", 0x8000]]));
        });
    });

    describe("WHEN the listing contains an error", () => {
        const out = new Fixasm({}).run("broken.s", listing + "\nhalt");

        test("THEN the error should be reported instead of output", () => {
            expect(out.binary.length).toEqual(0);
            expect(out.labels.size).toEqual(0);
            expect(out.errors.length).toEqual(1);
            expect(out.errors[0]).toBeInstanceOf(UnknownMnemonicError);
            expect(out.errors[0]).toMatchObject({ inputName: "broken.s", line: 5 });
        });
    });
});
