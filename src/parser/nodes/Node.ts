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

export enum NodeType {
    Program,
    Statement,

    // Operands
    Register,
    Immediate,
    LabelRef,
}

export type Node = Program | Statement | Operand;
export type Operand = Register | Immediate | LabelRef;

export interface BaseNode {
    type: NodeType;
}

export interface Program extends BaseNode {
    type: NodeType.Program;
    inputName: string;
    stmts: Statement[];
}

export interface Statement extends BaseNode {
    type: NodeType.Statement;
    inputName: string;
    line: number;       // 1-based
    source: string;     // trimmed line
    mnemonic: string;
    operands: Operand[];
}

// every operand keeps its text: label fields accept any token as a label name
export interface BaseOperand extends BaseNode {
    text: string;
}

export interface Register extends BaseOperand {
    type: NodeType.Register;
    index: number;
}

export interface Immediate extends BaseOperand {
    type: NodeType.Immediate;
    value: number;
}

export interface LabelRef extends BaseOperand {
    type: NodeType.LabelRef;
    name: string;
}
