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

import { CodeError } from "../utils/CodeError.js";
import { numToHex } from "../utils/Strings.js";

/**
 * Base class of all failures raised while assembling a program.
 * The driver attaches the offending statement before the error leaves the assembler.
 */
export class AssemblerError extends CodeError {
    public constructor(msg: string) {
        super(msg);
        this.name = AssemblerError.name;
    }
}

export class RegisterFormatError extends AssemblerError {
    public constructor(public readonly field: string, public readonly operand: string) {
        super(`Field ${field} expects a register, got '${operand}'`);
        this.name = RegisterFormatError.name;
    }
}

export class NumberFormatError extends AssemblerError {
    public constructor(public readonly field: string, public readonly operand: string) {
        super(`Field ${field} expects a number, got '${operand}'`);
        this.name = NumberFormatError.name;
    }
}

export class FieldRangeError extends AssemblerError {
    public constructor(
        public readonly field: string,
        public readonly value: number,
        public readonly bits: number,
        public readonly signed: boolean,
    ) {
        super(`Value ${value} does not fit ${signed ? "signed" : "unsigned"} ${bits} bit field ${field}`);
        this.name = FieldRangeError.name;
    }
}

export class AlignmentError extends AssemblerError {
    public constructor(
        public readonly field: string,
        public readonly label: string,
        public readonly distance: number,
    ) {
        super(`Unaligned ${field}: ${label} is ${distance} bytes away`);
        this.name = AlignmentError.name;
    }
}

export class LabelRedefinitionError extends AssemblerError {
    public constructor(
        public readonly label: string,
        public readonly previous: number,
        public readonly address: number,
    ) {
        super(`Redefining label ${label} from 0x${numToHex(previous, 8)} to 0x${numToHex(address, 8)}`);
        this.name = LabelRedefinitionError.name;
    }
}

export class UndefinedLabelError extends AssemblerError {
    public constructor(public readonly label: string) {
        super(`Label ${label} not defined`);
        this.name = UndefinedLabelError.name;
    }
}

export class UnknownMnemonicError extends AssemblerError {
    public constructor(public readonly mnemonic: string) {
        super(`Unknown instruction ${mnemonic}`);
        this.name = UnknownMnemonicError.name;
    }
}

export class UnknownFieldError extends AssemblerError {
    public constructor(public readonly field: string, public readonly layout: string) {
        super(`Unknown field '${field}' in layout '${layout}'`);
        this.name = UnknownFieldError.name;
    }
}

export class OperandCountError extends AssemblerError {
    public constructor(
        public readonly mnemonic: string,
        public readonly required: number,
        public readonly supplied: number,
    ) {
        super(`${mnemonic} needs ${required} operands, got ${supplied}`);
        this.name = OperandCountError.name;
    }
}
