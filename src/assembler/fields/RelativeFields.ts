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

import { NodeType } from "../../parser/nodes/Node.js";
import { checkSigned, WordSize } from "../../utils/Bits.js";
import { AlignmentError } from "../AssemblerError.js";
import { FieldEncoder, RegisterFieldFunction } from "./FieldEncoder.js";

export function registerRelativeFields(register: RegisterFieldFunction) {
    register("rel24", relativeField("rel24", 24));
    register("rel16", relativeField("rel16", 16));
}

/**
 * Word distance from the current instruction to a label.
 * Any operand text names the label, so labels may look like numbers or registers.
 */
function relativeField(name: string, bits: number): FieldEncoder {
    return (ctx, operand) => {
        const label = operand.type == NodeType.LabelRef ? operand.name : operand.text;

        if (!ctx.final) {
            // the word is thrown away after the label pass and labels may be unknown yet
            return 0;
        }

        const distance = ctx.labels.lookup(label) - ctx.address;
        if (distance % WordSize != 0) {
            throw new AlignmentError(name, label, distance);
        }

        return checkSigned(name, distance / WordSize, bits);
    };
}
