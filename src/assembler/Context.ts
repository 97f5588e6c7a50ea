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

import { WordWriter } from "../output/WordWriter.js";
import { MaxAddress, WordSize } from "../utils/Bits.js";
import { AssemblerError } from "./AssemblerError.js";
import { LabelTable } from "./LabelTable.js";

/**
 * State of a single pass: load address, labels seen so far and the words emitted.
 */
export class Context {
    private base_: number;
    private final_: boolean;
    private labels_: LabelTable;
    private writer = new WordWriter();

    public constructor(base: number, labels: ReadonlyMap<string, number>, final: boolean) {
        this.base_ = base;
        this.final_ = final;
        this.labels_ = new LabelTable(labels);
    }

    public get base() {
        return this.base_;
    }

    // only the final pass sees every label, so only it validates label-relative fields
    public get final() {
        return this.final_;
    }

    public get labels() {
        return this.labels_;
    }

    public get address() {
        return this.base_ + this.writer.length;
    }

    public emit(word: number) {
        if (this.address + WordSize - 1 > MaxAddress) {
            throw new AssemblerError("Program exceeds the 32 bit address space");
        }
        this.writer.writeWord(word >>> 0);
    }

    public get code(): Uint8Array {
        return this.writer.finish();
    }
}
