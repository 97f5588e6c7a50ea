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

import * as Nodes from "./nodes/Node.js";
import { NodeType } from "./nodes/Node.js";
import { parseOperand } from "./parsers/OperandParser.js";

export class Parser {
    public static readonly CommentChar = "#";

    private inputName: string;
    private input: string;

    public constructor(inputName: string, input: string) {
        this.inputName = inputName;
        this.input = input;
    }

    public parseProgram(): Nodes.Program {
        const prog: Nodes.Program = {
            type: NodeType.Program,
            inputName: this.inputName,
            stmts: [],
        };

        const lines = this.input.split(/\r?\n/);
        lines.forEach((rawLine, idx) => {
            const line = rawLine.trim();
            if (line.length == 0 || line.startsWith(Parser.CommentChar)) {
                return;
            }
            prog.stmts.push(this.parseStatement(line, idx + 1));
        });

        return prog;
    }

    private parseStatement(line: string, lineNum: number): Nodes.Statement {
        const match = line.match(/^(\S+)\s*(.*)$/);
        const mnemonic = match?.[1] ?? line;
        const rest = match?.[2]?.trim() ?? "";

        const operands = rest.length == 0
            ? []
            : rest.split(",").map(arg => parseOperand(arg.trim()));

        return {
            type: NodeType.Statement,
            inputName: this.inputName,
            line: lineNum,
            source: line,
            mnemonic,
            operands,
        };
    }
}
