import { NodeType } from "../../src/parser/nodes/Node.js";
import { Parser } from "../../src/parser/Parser.js";

describe("GIVEN an assembly source", () => {
    const source = [
        "  # setup",
        "",
        "  addi r1 , r2,  10  ",
        "ret.d",
        "\tlbl\tloop",
        "   ",
        "b.t 0, r1, loop",
    ].join("\r\n");

    describe("WHEN parsing it", () => {
        const prog = new Parser("test.s", source).parseProgram();

        test("THEN blank and comment lines should be skipped", () => {
            expect(prog.inputName).toEqual("test.s");
            expect(prog.stmts.map(s => s.line)).toEqual([3, 4, 5, 7]);
        });

        test("THEN statements should be split into mnemonic and trimmed operands", () => {
            const addi = prog.stmts[0];
            expect(addi?.mnemonic).toEqual("addi");
            expect(addi?.source).toEqual("addi r1 , r2,  10");
            expect(addi?.operands.map(o => o.text)).toEqual(["r1", "r2", "10"]);
            expect(addi?.operands.map(o => o.type)).toEqual([NodeType.Register, NodeType.Register, NodeType.Immediate]);
        });

        test("THEN statements without operands should have none", () => {
            expect(prog.stmts[1]?.mnemonic).toEqual("ret.d");
            expect(prog.stmts[1]?.operands).toEqual([]);
        });

        test("THEN tabs should separate the mnemonic", () => {
            expect(prog.stmts[2]?.mnemonic).toEqual("lbl");
            expect(prog.stmts[2]?.operands.map(o => o.text)).toEqual(["loop"]);
        });

        test("THEN label operands should be references", () => {
            expect(prog.stmts[3]?.operands[2]).toEqual({ type: NodeType.LabelRef, text: "loop", name: "loop" });
        });
    });
});
