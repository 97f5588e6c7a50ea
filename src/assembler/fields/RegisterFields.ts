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
import { checkUnsigned } from "../../utils/Bits.js";
import { RegisterFormatError } from "../AssemblerError.js";
import { FieldEncoder, RegisterFieldFunction } from "./FieldEncoder.js";

export const RegisterBits = 5;

export function registerRegisterFields(register: RegisterFieldFunction) {
    register("rs", registerField("rs", 21));
    register("rd", registerField("rd", 16));
    register("rt", registerField("rt", 11));
}

function registerField(name: string, shift: number): FieldEncoder {
    return (_ctx, operand) => {
        if (operand.type != NodeType.Register) {
            throw new RegisterFormatError(name, operand.text);
        }
        return checkUnsigned(name, operand.index, RegisterBits) * 2 ** shift;
    };
}
