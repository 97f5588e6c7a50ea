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

import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";
import { parseIntSafe, tryParseNumber } from "../../utils/Strings.js";

export const RegisterAliases: ReadonlyMap<string, number> = new Map([
    ["zero", 0],
]);

/**
 * Classifies an operand by its syntax alone.
 * Range checks are left to the field that consumes the operand.
 */
export function parseOperand(text: string): Nodes.Operand {
    const alias = RegisterAliases.get(text);
    if (alias !== undefined) {
        return { type: NodeType.Register, text, index: alias };
    }

    const regDigits = text.match(/^r([0-9]+)$/)?.[1];
    if (regDigits !== undefined) {
        return { type: NodeType.Register, text, index: parseIntSafe(regDigits, 10) };
    }

    const value = tryParseNumber(text);
    if (value !== undefined) {
        return { type: NodeType.Immediate, text, value };
    }

    return { type: NodeType.LabelRef, text, name: text };
}
