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

export * from "./Fixasm.js";
export * from "./parser/nodes/Node.js";
export * from "./parser/Parser.js";
export * from "./parser/parsers/OperandParser.js";
export * from "./assembler/Assembler.js";
export * from "./assembler/AssemblerError.js";
export * from "./assembler/Context.js";
export * from "./assembler/InstructionTable.js";
export * from "./assembler/LabelTable.js";
export * from "./assembler/fields/Fields.js";
export * from "./output/WordWriter.js";
export * from "./output/compareBin.js";
export * from "./utils/Bits.js";
export * from "./utils/CodeError.js";
