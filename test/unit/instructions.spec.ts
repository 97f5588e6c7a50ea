import { Assembler } from "../../src/assembler/Assembler.js";
import {
    LabelRedefinitionError, OperandCountError, UnknownFieldError, UnknownMnemonicError,
} from "../../src/assembler/AssemblerError.js";
import { Context } from "../../src/assembler/Context.js";
import { createInstructionTable, InstructionLayouts, Instructions } from "../../src/assembler/InstructionTable.js";
import { parseOperand } from "../../src/parser/parsers/OperandParser.js";
import { thrownBy, toWords } from "../util.js";

function run(mnemonic: string, operands: string[], ctx: Context) {
    const handler = Instructions.get(mnemonic);
    if (!handler) {
        throw Error(`No instruction ${mnemonic}`);
    }
    handler(ctx, operands.map(parseOperand));
}

describe("GIVEN the built-in instruction table", () => {
    test("THEN every layout and lbl should be registered", () => {
        for (const mnemonic of Object.keys(InstructionLayouts)) {
            expect(Instructions.has(mnemonic)).toBe(true);
        }
        expect(Instructions.has("lbl")).toBe(true);
        expect(Instructions.size).toEqual(Object.keys(InstructionLayouts).length + 1);
    });

    describe("WHEN encoding an instruction", () => {
        const ctx = new Context(0, new Map(), true);
        run("addi", ["r1", "r2", "10"], ctx);

        test("THEN it should OR all fields into one word", () => {
            expect(toWords(ctx.code)).toEqual([0x0041000A]);
        });
    });

    describe("WHEN operands are missing", () => {
        const ctx = new Context(0, new Map(), true);

        test("THEN it should fail with the required count", () => {
            const e = thrownBy(() => run("addi", ["r1", "r2"], ctx));
            expect(e).toBeInstanceOf(OperandCountError);
            expect(e).toMatchObject({ mnemonic: "addi", required: 3, supplied: 2 });
            expect(ctx.code.length).toEqual(0);
        });

        test("THEN lbl without a name should fail", () => {
            expect(() => run("lbl", [], ctx)).toThrow(OperandCountError);
        });
    });

    describe("WHEN extra operands are given", () => {
        const ctx = new Context(0, new Map(), true);
        run("st.d", ["r0", "r4", "r5", "0x08", "0x2"], ctx);

        test("THEN they should be ignored", () => {
            expect(toWords(ctx.code)).toEqual([0x6C80280A]);
        });
    });

    describe("WHEN declaring labels", () => {
        const ctx = new Context(0x40, new Map(), false);
        run("lbl", ["first"], ctx);
        run("lbl", ["first"], ctx);
        run("addi", ["r0", "r0", "0"], ctx);
        run("lbl", ["second"], ctx);

        test("THEN they should be bound to the current address without emitting", () => {
            expect(ctx.labels.getLabels()).toEqual(new Map([["first", 0x40], ["second", 0x44]]));
            expect(ctx.code.length).toEqual(4);
        });

        test("THEN a declaration at another address should fail", () => {
            expect(() => run("lbl", ["first"], ctx)).toThrow(LabelRedefinitionError);
        });
    });
});

describe("GIVEN a custom instruction table", () => {
    test("THEN unknown fields should be rejected when building it", () => {
        const e = thrownBy(() => createInstructionTable({ "bad": "opcode:0x01 nope:" }));
        expect(e).toBeInstanceOf(UnknownFieldError);
        expect(e).toMatchObject({ field: "nope", layout: "opcode:0x01 nope:" });
    });

    test("THEN tokens without a separator should be rejected", () => {
        expect(() => createInstructionTable({ "bad": "opcode" })).toThrow(UnknownFieldError);
    });

    test("THEN lbl should not be replaceable", () => {
        expect(() => createInstructionTable({ "lbl": "opcode:" })).toThrow("lbl can't be redefined");
    });

    describe("WHEN assembling with it", () => {
        const instructions = createInstructionTable({ "nop": "opcode:0x3f funct:0x001" });
        const asm = new Assembler({ instructions });

        test("THEN its mnemonics should be used", () => {
            const prog = asm.parseInput("test.s", "lbl top\nnop\nnop");
            const result = asm.assembleProgram(prog);
            expect(toWords(result.binary)).toEqual([0xFC000001, 0xFC000001]);
        });

        test("THEN the built-in mnemonics should be gone", () => {
            const prog = asm.parseInput("test.s", "addi r1, r0, 1");
            expect(() => asm.assembleProgram(prog)).toThrow(UnknownMnemonicError);
        });
    });
});
