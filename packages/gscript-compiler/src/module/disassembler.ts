/**
 * gscript Module - Disassembler
 *
 * SPDX-License-Identifier: MIT
 *
 * Renders code cells one instruction per line:
 *
 *     12: LITTOREG mar, 4 [data]
 *     15: JZ -> 22
 */

import { OPCODE_BY_VALUE, REGISTER_NAMES } from './opcodes.ts';
import { FIXUP_TYPE_NAMES } from './types.ts';
import type { ScriptModule, FixupTypeValue } from './types.ts';

/**
 * One decoded instruction.
 */
export interface DisassembledInstruction {
    loc: number;
    mnemonic: string;
    operands: string[];
    /** Fixup types of the operand cells, in operand order */
    fixups: FixupTypeValue[];
}

/**
 * Decode the code of a module. Unknown opcodes and truncated operands are
 * rendered as `.cell` lines so the rest of the code still decodes.
 */
export function decodeInstructions(module: Pick<ScriptModule, 'code' | 'fixups'>): DisassembledInstruction[] {
    const code = module.code;
    const fixupAt = new Map<number, FixupTypeValue>(module.fixups.map(f => [f.codeLoc, f.type]));
    const result: DisassembledInstruction[] = [];

    let loc = 0;
    while (loc < code.length) {
        const opcode = code[loc] ?? 0;
        const info = OPCODE_BY_VALUE.get(opcode);
        if (info === undefined || loc + info.operands.length >= code.length) {
            result.push({ loc, mnemonic: '.cell', operands: [String(opcode)], fixups: [] });
            loc++;
            continue;
        }

        const operands: string[] = [];
        const fixups: FixupTypeValue[] = [];
        info.operands.forEach((kind, i) => {
            const cellLoc = loc + 1 + i;
            const value = code[cellLoc] ?? 0;
            switch (kind) {
                case 'reg':
                    operands.push(REGISTER_NAMES[value] ?? `r${value}`);
                    break;
                case 'jump':
                    operands.push(`-> ${cellLoc + 1 + value}`);
                    break;
                case 'lit':
                    operands.push(String(value));
                    break;
            }
            const fixup = fixupAt.get(cellLoc);
            if (fixup !== undefined) fixups.push(fixup);
        });

        result.push({ loc, mnemonic: info.mnemonic, operands, fixups });
        loc += 1 + info.operands.length;
    }
    return result;
}

/**
 * Render one instruction.
 */
export function formatInstruction(instruction: DisassembledInstruction): string {
    const loc = String(instruction.loc).padStart(5);
    const operands = instruction.operands.length > 0 ? ` ${instruction.operands.join(', ')}` : '';
    const fixups = instruction.fixups.map(type => ` [${FIXUP_TYPE_NAMES[type]}]`).join('');
    return `${loc}: ${instruction.mnemonic}${operands}${fixups}`;
}

/**
 * Disassemble a module's code, one line per instruction.
 */
export function disassemble(module: Pick<ScriptModule, 'code' | 'fixups'>): string {
    return decodeInstructions(module).map(formatInstruction).join('\n');
}
