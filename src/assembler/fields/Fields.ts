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

import { FieldEncoder } from "./FieldEncoder.js";
import { registerImmediateFields } from "./ImmediateFields.js";
import { registerRegisterFields } from "./RegisterFields.js";
import { registerRelativeFields } from "./RelativeFields.js";

export type { FieldEncoder } from "./FieldEncoder.js";

function buildFields(): ReadonlyMap<string, FieldEncoder> {
    const fields = new Map<string, FieldEncoder>();

    const register = (name: string, encoder: FieldEncoder) => {
        if (fields.has(name)) {
            throw Error(`Multiple encoders for field ${name}`);
        }
        fields.set(name, encoder);
    };

    registerRegisterFields(register);
    registerImmediateFields(register);
    registerRelativeFields(register);

    return fields;
}

export const Fields = buildFields();
