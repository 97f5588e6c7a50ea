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
import { checkSigned, checkUnsigned } from "../../utils/Bits.js";
import { NumberFormatError } from "../AssemblerError.js";
import { FieldEncoder, RegisterFieldFunction } from "./FieldEncoder.js";

export function registerImmediateFields(register: RegisterFieldFunction) {
    register("opcode",  unsignedField("opcode", 6, 26));
    register("cmpop",   unsignedField("cmpop", 5, 16));
    register("bitsel",  unsignedField("bitsel", 5, 16));
    register("uimm16",  unsignedField("uimm16", 16, 0));
    register("jmpop",   unsignedField("jmpop", 2, 0));
    register("off11",   unsignedField("off11", 11, 0));
    register("twobits", unsignedField("twobits", 2, 0));
    register("funct",   unsignedField("funct", 11, 0));
    register("simm16",  signedField("simm16", 16));
}

function unsignedField(name: string, bits: number, shift: number): FieldEncoder {
    return (_ctx, operand) => {
        if (operand.type != NodeType.Immediate) {
            throw new NumberFormatError(name, operand.text);
        }
        return checkUnsigned(name, operand.value, bits) * 2 ** shift;
    };
}

function signedField(name: string, bits: number): FieldEncoder {
    return (_ctx, operand) => {
        if (operand.type != NodeType.Immediate) {
            throw new NumberFormatError(name, operand.text);
        }
        return checkSigned(name, operand.value, bits);
    };
}
