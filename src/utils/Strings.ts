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

export function numToHex(num: number, width: number): string {
    return num.toString(16).padStart(width, "0");
}

export function parseIntSafe(str: string, radix: 10 | 16): number {
    let allowed;
    switch (radix) {
        case 10:    allowed = /^[0-9]+$/; break;
        case 16:    allowed = /^[0-9A-Fa-f]+$/; break;
    }

    if (!str.match(allowed)) {
        throw Error(`Invalid symbols in number for radix ${radix}`);
    }

    return Number.parseInt(str, radix);
}

/**
 * Parses a decimal or 0x-prefixed hexadecimal literal with an optional minus sign.
 * Returns undefined if the string is not such a literal.
 */
export function tryParseNumber(str: string): number | undefined {
    const match = str.match(/^(-?)(0[xX]([0-9A-Fa-f]+)|([0-9]+))$/);
    if (!match) {
        return undefined;
    }

    const [, sign, , hexDigits, decDigits] = match;
    const magnitude = hexDigits !== undefined
        ? parseIntSafe(hexDigits, 16)
        : parseIntSafe(decDigits ?? "", 10);

    return sign ? -magnitude : magnitude;
}
