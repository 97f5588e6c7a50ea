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

import { FieldRangeError } from "../assembler/AssemblerError.js";

export const WordSize = 4;
export const MaxAddress = 0xFFFFFFFF;

export function isUnsigned(value: number, bits: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < 2 ** bits;
}

export function isSigned(value: number, bits: number): boolean {
    return Number.isInteger(value) && value >= -(2 ** (bits - 1)) && value < 2 ** (bits - 1);
}

export function checkUnsigned(field: string, value: number, bits: number): number {
    if (!isUnsigned(value, bits)) {
        throw new FieldRangeError(field, value, bits, false);
    }
    return value;
}

// returns the two's complement pattern of value in the given width
export function checkSigned(field: string, value: number, bits: number): number {
    if (!isSigned(value, bits)) {
        throw new FieldRangeError(field, value, bits, true);
    }
    return value < 0 ? value + 2 ** bits : value;
}

export function extractBits(word: number, shift: number, bits: number): number {
    return Math.floor(word / 2 ** shift) % 2 ** bits;
}

export function signExtend(value: number, bits: number): number {
    return value >= 2 ** (bits - 1) ? value - 2 ** bits : value;
}
