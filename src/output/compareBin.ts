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
import { numToHex } from "../utils/Strings.js";

function readWord(data: Uint8Array, offset: number): number | undefined {
    if (offset + WordSize > data.length) {
        return undefined;
    }
    return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(offset, false);
}

export function compareBin(name: string, ours: Uint8Array, other: Uint8Array, base = 0): boolean {
    const size = Math.max(ours.length, other.length);
    let good = true;

    if (ours.length != other.length) {
        good = false;
        console.log(`size: our ${ours.length} != other ${other.length} bytes in ${name}`);
    }

    for (let offset = 0; offset < size; offset += WordSize) {
        const ourWord = readWord(ours, offset);
        const otherWord = readWord(other, offset);
        if (ourWord !== otherWord) {
            good = false;
            const addrStr = numToHex(base + offset, 8);
            const ourStr = ourWord !== undefined ? numToHex(ourWord, 8) : "null";
            const otherStr = otherWord !== undefined ? numToHex(otherWord, 8) : "null";
            console.log(`${addrStr}: our ${ourStr} != other ${otherStr} in ${name}`);
        }
    }

    return good;
}
