import { Assembler, AssemblyResult } from "../src/assembler/Assembler.js";
import { FieldEncoder, Fields } from "../src/assembler/fields/Fields.js";
import { CodeError } from "../src/utils/CodeError.js";

export interface TestData extends AssemblyResult {
    words: number[];
}

export function toWords(binary: Uint8Array): number[] {
    const view = new DataView(binary.buffer, binary.byteOffset, binary.byteLength);
    const words: number[] = [];
    for (let i = 0; i < binary.length; i += 4) {
        words.push(view.getUint32(i, false));
    }
    return words;
}

export function assemble(input: string, base = 0): TestData {
    const asm = new Assembler({ base });
    const prog = asm.parseInput("test.s", input);
    const result = asm.assembleProgram(prog);
    return { ...result, words: toWords(result.binary) };
}

export function assembleError(input: string, base = 0): CodeError {
    try {
        assemble(input, base);
    } catch (e) {
        if (e instanceof CodeError) {
            return e;
        }
        throw e;
    }
    throw Error("Expected assembly to fail");
}

export function field(name: string): FieldEncoder {
    const encoder = Fields.get(name);
    if (!encoder) {
        throw Error(`No field ${name}`);
    }
    return encoder;
}

export function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw Error("Expected an error");
}
