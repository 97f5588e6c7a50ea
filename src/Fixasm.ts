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

import { Assembler, AssemblerOptions } from "./assembler/Assembler.js";
import { CodeError } from "./utils/CodeError.js";

export type FixasmOptions = AssemblerOptions;

export interface FixasmOutput {
    binary: Uint8Array;
    errors: ReadonlyArray<CodeError>;
    labels: ReadonlyMap<string, number>;
}

export class Fixasm {
    private asm: Assembler;

    public constructor(opts: FixasmOptions) {
        this.asm = new Assembler(opts);
    }

    public run(inputName: string, content: string): FixasmOutput {
        const prog = this.asm.parseInput(inputName, content);
        try {
            const { binary, labels } = this.asm.assembleProgram(prog);
            return { binary, labels, errors: [] };
        } catch (e) {
            if (e instanceof CodeError) {
                return { binary: new Uint8Array(), labels: new Map(), errors: [e] };
            }
            throw e;
        }
    }
}
