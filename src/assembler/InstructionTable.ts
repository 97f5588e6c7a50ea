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

import * as Nodes from "../parser/nodes/Node.js";
import { parseOperand } from "../parser/parsers/OperandParser.js";
import { OperandCountError, UnknownFieldError } from "./AssemblerError.js";
import { Context } from "./Context.js";
import { FieldEncoder, Fields } from "./fields/Fields.js";

export type InstructionHandler = (ctx: Context, operands: readonly Nodes.Operand[]) => void;
export type InstructionTable = ReadonlyMap<string, InstructionHandler>;

// Layout tokens are field:literal (fixed operand) or field: (next operand from the statement)
export const InstructionLayouts: Readonly<Record<string, string>> = {
    "unk.r":    "opcode: rd: rs: rt: funct:",
    "unk.i":    "opcode: rd: rs: uimm16:",
    "addi":     "opcode:0x00 rd: rs: simm16:",
    "set0":     "opcode:0x06 rd: rs: uimm16:",
    "set1":     "opcode:0x07 rd: rs: uimm16:",
    "set3":     "opcode:0x08 rd: rs: uimm16:",
    "set2":     "opcode:0x09 rd: rs: uimm16:",
    "call":     "opcode:0x25 jmpop:0x0 rel24:",
    "jump":     "opcode:0x25 jmpop:0x1 rel24:",
    "alu.r":    "opcode:0x3f funct: rd: rs: rt:",
    "add":      "opcode:0x3f rd: rs: rt: funct:0x000",
    "sub":      "opcode:0x3f rd: rs: rt: funct:0x004",
    "subs":     "opcode:0x3f rd: rs: rt: funct:0x005",
    "alur.0xb": "opcode:0x3f rd: rs: rt: funct:0x00b",
    "ret.d":    "opcode:0x3f rd: rs: rt: funct:0x02d",
    "b.t":      "opcode:0x28 cmpop: rs: rel16:",
    "b.f":      "opcode:0x29 cmpop: rs: rel16:",
    "b.set":    "opcode:0x2a rs: bitsel: rel16:",
    "b.clr":    "opcode:0x2b rs: bitsel: rel16:",
    "ld.b":     "opcode:0x18 rd: rs: simm16:",
    "ld.q":     "opcode:0x19 rd: rs: rt: off11: twobits:0x0",
    "ld.uw":    "opcode:0x19 rd: rs: rt: off11: twobits:0x1",
    "ld.d":     "opcode:0x19 rd: rs: rt: off11: twobits:0x2",
    "ld.lw":    "opcode:0x19 rd: rs: rt: off11: twobits:0x3",
    "st.d":     "opcode:0x1b rd: rs: rt: off11: twobits:0x2",
    "st.q":     "opcode:0x1e rd: rs: rt: off11: twobits:",
};

export const LabelMnemonic = "lbl";

interface LayoutToken {
    encoder: FieldEncoder;
    literal?: Nodes.Operand;
}

export function createInstructionTable(
    layouts: Readonly<Record<string, string>>,
    fields: ReadonlyMap<string, FieldEncoder> = Fields,
): InstructionTable {
    const table = new Map<string, InstructionHandler>();

    for (const [mnemonic, layout] of Object.entries(layouts)) {
        if (mnemonic == LabelMnemonic) {
            throw Error(`${LabelMnemonic} can't be redefined`);
        }
        table.set(mnemonic, defineWord(mnemonic, layout, fields));
    }
    table.set(LabelMnemonic, defineLabel);

    return table;
}

function defineWord(mnemonic: string, layout: string, fields: ReadonlyMap<string, FieldEncoder>): InstructionHandler {
    const tokens = layout
        .split(" ")
        .filter(part => part.length > 0)
        .map(part => parseToken(part, layout, fields));
    const required = tokens.filter(t => t.literal === undefined).length;

    return (ctx, operands) => {
        let word = 0;
        let next = 0;
        for (const token of tokens) {
            const operand = token.literal ?? operands[next++];
            if (!operand) {
                throw new OperandCountError(mnemonic, required, operands.length);
            }
            word = (word | token.encoder(ctx, operand)) >>> 0;
        }
        ctx.emit(word);
    };
}

function parseToken(part: string, layout: string, fields: ReadonlyMap<string, FieldEncoder>): LayoutToken {
    const sep = part.indexOf(":");
    if (sep < 0) {
        throw new UnknownFieldError(part, layout);
    }

    const field = part.substring(0, sep);
    const literal = part.substring(sep + 1);
    const encoder = fields.get(field);
    if (!encoder) {
        throw new UnknownFieldError(field, layout);
    }

    if (literal.length == 0) {
        return { encoder };
    }
    return { encoder, literal: parseOperand(literal) };
}

function defineLabel(ctx: Context, operands: readonly Nodes.Operand[]) {
    const label = operands[0];
    if (!label) {
        throw new OperandCountError(LabelMnemonic, 1, 0);
    }
    ctx.labels.defineLabel(label.text, ctx.address);
}

export const Instructions = createInstructionTable(InstructionLayouts);
