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

import { LabelRedefinitionError, UndefinedLabelError } from "./AssemblerError.js";

export class LabelTable {
    private labels: Map<string, number>;

    // always copies so that a table can seed another pass without aliasing it
    public constructor(initial?: ReadonlyMap<string, number>) {
        this.labels = new Map(initial);
    }

    public defineLabel(name: string, address: number) {
        const existing = this.labels.get(name);
        if (existing !== undefined) {
            if (existing != address) {
                throw new LabelRedefinitionError(name, existing, address);
            }
            return;
        }
        this.labels.set(name, address);
    }

    public tryLookup(name: string): number | undefined {
        return this.labels.get(name);
    }

    public lookup(name: string): number {
        const addr = this.tryLookup(name);
        if (addr === undefined) {
            throw new UndefinedLabelError(name);
        }
        return addr;
    }

    public getLabels(): ReadonlyMap<string, number> {
        return this.labels;
    }
}
