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

import { WordSize } from "../utils/Bits.js";

/**
 * Collects 32 bit instruction words, most significant byte first.
 */
export class WordWriter {
    private data: number[] = [];

    public get length(): number {
        return this.data.length;
    }

    public writeWord(word: number): void {
        this.writeByte(word >>> 24);
        this.writeByte(word >>> 16);
        this.writeByte(word >>> 8);
        this.writeByte(word);
    }

    private writeByte(byte: number): void {
        this.data.push(byte & 0xFF);
    }

    public finish(): Uint8Array {
        if (this.data.length % WordSize != 0) {
            throw Error("Output is not word aligned");
        }
        return new Uint8Array(this.data);
    }
}
