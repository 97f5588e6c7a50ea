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

export interface SourceLocation {
    inputName: string;
    line: number;
    source: string;
}

export class CodeError extends Error {
    public inputName?: string;
    public line?: number;
    public source?: string;

    public constructor(msg: string, loc?: SourceLocation) {
        super(msg);
        this.name = CodeError.name;

        if (loc) {
            this.locate(loc);
        }
    }

    /**
     * Attaches the statement that caused the error unless a location is already known.
     */
    public locate(loc: SourceLocation): this {
        if (this.line === undefined) {
            this.inputName = loc.inputName;
            this.line = loc.line;
            this.source = loc.source;
        }
        return this;
    }
}

export function formatCodeError(error: CodeError) {
    if (error.line === undefined) {
        return error.message;
    }
    return `${error.inputName}:${error.line}: ${error.message} in '${error.source}'`;
}
