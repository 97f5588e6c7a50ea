/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { Parser } from "../parser/Parser.js";
import * as Nodes from "../parser/nodes/Node.js";
import { isUnsigned } from "../utils/Bits.js";
import { CodeError } from "../utils/CodeError.js";
import { UnknownMnemonicError } from "./AssemblerError.js";
import { Context } from "./Context.js";
import { InstructionTable, Instructions } from "./InstructionTable.js";

export interface AssemblerOptions {
    base?: number;                          // load address of the first byte, default 0
    instructions?: InstructionTable;        // replaces the built-in instruction set
}

export interface AssemblyResult {
    binary: Uint8Array;
    labels: ReadonlyMap<string, number>;
}

export class Assembler {
    private base: number;
    private instructions: InstructionTable;

    public constructor(options: AssemblerOptions = {}) {
        this.base = options.base ?? 0;
        this.instructions = options.instructions ?? Instructions;

        if (!isUnsigned(this.base, 32)) {
            throw RangeError(`Base address ${this.base} is not an unsigned 32 bit value`);
        }
    }

    public parseInput(name: string, input: string): Nodes.Program {
        const parser = new Parser(name, input);
        return parser.parseProgram();
    }

    public assembleProgram(prog: Nodes.Program): AssemblyResult {
        // pass 1: every instruction has the same size, so this already yields the final label addresses
        const labelPass = this.doPass(prog, new Map(), false);

        // pass 2: generate code with all labels known
        const outputPass = this.doPass(prog, labelPass.labels.getLabels(), true);

        return {
            binary: outputPass.code,
            labels: outputPass.labels.getLabels(),
        };
    }

    private doPass(prog: Nodes.Program, labels: ReadonlyMap<string, number>, final: boolean): Context {
        const ctx = new Context(this.base, labels, final);
        for (const stmt of prog.stmts) {
            try {
                this.handleStatement(ctx, stmt);
            } catch (e) {
                if (e instanceof CodeError) {
                    throw e.locate(stmt);
                }
                throw e;
            }
        }
        return ctx;
    }

    private handleStatement(ctx: Context, stmt: Nodes.Statement) {
        const handler = this.instructions.get(stmt.mnemonic);
        if (!handler) {
            throw new UnknownMnemonicError(stmt.mnemonic);
        }
        handler(ctx, stmt.operands);
    }
}

export function assemble(source: string, base = 0): Uint8Array {
    const asm = new Assembler({ base });
    const prog = asm.parseInput("input", source);
    return asm.assembleProgram(prog).binary;
}
