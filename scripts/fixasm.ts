#!/usr/bin/env node
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

import { command, extendType, flag, option, optional, positional, run, string } from "cmd-ts";
import { readFileSync, writeFileSync } from "fs";
import { basename, extname } from "path";
import { Fixasm, FixasmOptions } from "../src/Fixasm.js";
import { compareBin } from "../src/output/compareBin.js";
import { isUnsigned } from "../src/utils/Bits.js";
import { formatCodeError } from "../src/utils/CodeError.js";
import { numToHex, tryParseNumber } from "../src/utils/Strings.js";

const Address = extendType(string, {
    displayName: "address",
    description: "decimal or 0x-prefixed hexadecimal address",
    async from(str) {
        const addr = tryParseNumber(str);
        if (addr === undefined || !isUnsigned(addr, 32)) {
            throw new Error(`Invalid address '${str}'`);
        }
        return addr;
    },
});

const cmd = command({
    name: "fixasm",
    description: "Two-pass assembler for fixed-width 32 bit instructions",
    args: {
        base: option({
            long: "base",
            short: "b",
            description: "Load address of the first instruction",
            type: Address,
            defaultValue: () => 0,
            defaultValueIsSerializable: true,
        }),
        output: option({
            long: "output",
            short: "o",
            description: "Output binary, defaults to the source name with .bin",
            type: optional(string),
        }),
        listLabels: flag({
            long: "labels",
            short: "l",
            description: "Print the label table",
        }),
        compareWith: option({
            long: "compare",
            short: "c",
            description: "Compare output with given bin file",
            type: optional(string),
        }),
        source: positional({
            displayName: "source",
            description: "Assembly source file",
            type: string,
        }),
    },

    handler: (args) => {
        const opts: FixasmOptions = { base: args.base };
        const fixasm = new Fixasm(opts);

        const src = readFileSync(args.source, "utf-8");
        const output = fixasm.run(args.source, src);
        if (output.errors.length > 0) {
            output.errors.forEach(e => console.error(formatCodeError(e)));
            process.exit(-1);
        }

        const outName = args.output ?? basename(args.source, extname(args.source)) + ".bin";
        writeFileSync(outName, output.binary);
        console.log(`Wrote ${output.binary.length} bytes`);

        if (args.listLabels) {
            for (const [name, addr] of output.labels) {
                console.log(`${name} = 0x${numToHex(addr, 8)}`);
            }
        }

        if (args.compareWith) {
            const otherBin = readFileSync(args.compareWith);
            const name = basename(args.compareWith);
            if (compareBin(name, output.binary, otherBin, args.base)) {
                console.log("No differences");
            } else {
                process.exit(-1);
            }
        }
    }
});

void run(cmd, process.argv.slice(2));
