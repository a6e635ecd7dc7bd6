/**
 * gscript Instruction Set
 *
 * SPDX-License-Identifier: MIT
 *
 * Opcode numbers, operand counts and register numbers of the bytecode VM.
 * These values are the VM's contract and must match it exactly.
 */

/**
 * VM registers.
 */
export const Register = {
    SP: 1,
    MAR: 2,
    AX: 3,
    BX: 4,
    CX: 5,
    OP: 6,
    DX: 7,
} as const;

export type RegisterValue = typeof Register[keyof typeof Register];

export const REGISTER_NAMES: Record<number, string> = {
    [Register.SP]: 'sp',
    [Register.MAR]: 'mar',
    [Register.AX]: 'ax',
    [Register.BX]: 'bx',
    [Register.CX]: 'cx',
    [Register.OP]: 'op',
    [Register.DX]: 'dx',
};

export const Opcode = {
    ADD: 1,             // reg1 += arg2
    SUB: 2,             // reg1 -= arg2
    REGTOREG: 3,        // reg2 = reg1
    WRITELIT: 4,        // m[MAR] = arg2 (arg1 bytes)
    RET: 5,
    LITTOREG: 6,        // reg1 = arg2
    MEMREAD: 7,         // reg1 = m[MAR]
    MEMWRITE: 8,        // m[MAR] = reg1
    MULREG: 9,
    DIVREG: 10,
    ADDREG: 11,
    SUBREG: 12,
    BITAND: 13,
    BITOR: 14,
    ISEQUAL: 15,
    NOTEQUAL: 16,
    GREATER: 17,
    LESSTHAN: 18,
    GTE: 19,
    LTE: 20,
    AND: 21,
    OR: 22,
    CALL: 23,           // call code at reg1
    MEMREADB: 24,
    MEMREADW: 25,
    MEMWRITEB: 26,
    MEMWRITEW: 27,
    JZ: 28,             // jump if ax == 0
    PUSHREG: 29,
    POPREG: 30,
    JMP: 31,
    MUL: 32,            // reg1 *= arg2
    CALLEXT: 33,        // call imported function at reg1
    PUSHREAL: 34,       // push reg1 for an imported call
    SUBREALSTACK: 35,
    LINENUM: 36,
    CALLAS: 37,
    THISBASE: 38,
    NUMFUNCARGS: 39,
    MODREG: 40,
    XORREG: 41,
    NOTREG: 42,
    SHIFTLEFT: 43,
    SHIFTRIGHT: 44,
    CALLOBJ: 45,        // next call is a member call on reg1
    CHECKBOUNDS: 46,
    MEMWRITEPTR: 47,
    MEMREADPTR: 48,
    MEMZEROPTR: 49,
    MEMINITPTR: 50,
    LOADSPOFFS: 51,     // MAR = SP - arg1
    CHECKNULL: 52,      // error if MAR == 0
    FADD: 53,
    FSUB: 54,
    FMULREG: 55,
    FDIVREG: 56,
    FADDREG: 57,
    FSUBREG: 58,
    FGREATER: 59,
    FLESSTHAN: 60,
    FGTE: 61,
    FLTE: 62,
    ZEROMEMORY: 63,     // m[MAR .. MAR+arg1-1] = 0
    CREATESTRING: 64,   // reg1 = new String(reg1)
    STRINGSEQUAL: 65,
    STRINGSNOTEQ: 66,
    CHECKNULLREG: 67,
    LOOPCHECKOFF: 68,
    MEMZEROPTRND: 69,   // release pointer at MAR unless it equals ax
    JNZ: 70,
    DYNAMICBOUNDS: 71,
    NEWARRAY: 72,
    NEWUSEROBJECT: 73,  // reg1 = new object of arg2 bytes
} as const;

export type OpcodeValue = typeof Opcode[keyof typeof Opcode];

/** Kind of an operand, used for disassembly */
export type OperandKind = 'reg' | 'lit' | 'jump';

export interface OpcodeInfo {
    mnemonic: string;
    operands: readonly OperandKind[];
}

const R: OperandKind = 'reg';
const L: OperandKind = 'lit';
const J: OperandKind = 'jump';

const OPERANDS: Record<OpcodeValue, readonly OperandKind[]> = {
    [Opcode.ADD]: [R, L],
    [Opcode.SUB]: [R, L],
    [Opcode.REGTOREG]: [R, R],
    [Opcode.WRITELIT]: [L, L],
    [Opcode.RET]: [],
    [Opcode.LITTOREG]: [R, L],
    [Opcode.MEMREAD]: [R],
    [Opcode.MEMWRITE]: [R],
    [Opcode.MULREG]: [R, R],
    [Opcode.DIVREG]: [R, R],
    [Opcode.ADDREG]: [R, R],
    [Opcode.SUBREG]: [R, R],
    [Opcode.BITAND]: [R, R],
    [Opcode.BITOR]: [R, R],
    [Opcode.ISEQUAL]: [R, R],
    [Opcode.NOTEQUAL]: [R, R],
    [Opcode.GREATER]: [R, R],
    [Opcode.LESSTHAN]: [R, R],
    [Opcode.GTE]: [R, R],
    [Opcode.LTE]: [R, R],
    [Opcode.AND]: [R, R],
    [Opcode.OR]: [R, R],
    [Opcode.CALL]: [R],
    [Opcode.MEMREADB]: [R],
    [Opcode.MEMREADW]: [R],
    [Opcode.MEMWRITEB]: [R],
    [Opcode.MEMWRITEW]: [R],
    [Opcode.JZ]: [J],
    [Opcode.PUSHREG]: [R],
    [Opcode.POPREG]: [R],
    [Opcode.JMP]: [J],
    [Opcode.MUL]: [R, L],
    [Opcode.CALLEXT]: [R],
    [Opcode.PUSHREAL]: [R],
    [Opcode.SUBREALSTACK]: [L],
    [Opcode.LINENUM]: [L],
    [Opcode.CALLAS]: [R],
    [Opcode.THISBASE]: [L],
    [Opcode.NUMFUNCARGS]: [L],
    [Opcode.MODREG]: [R, R],
    [Opcode.XORREG]: [R, R],
    [Opcode.NOTREG]: [R],
    [Opcode.SHIFTLEFT]: [R, R],
    [Opcode.SHIFTRIGHT]: [R, R],
    [Opcode.CALLOBJ]: [R],
    [Opcode.CHECKBOUNDS]: [R, L],
    [Opcode.MEMWRITEPTR]: [R],
    [Opcode.MEMREADPTR]: [R],
    [Opcode.MEMZEROPTR]: [],
    [Opcode.MEMINITPTR]: [R],
    [Opcode.LOADSPOFFS]: [L],
    [Opcode.CHECKNULL]: [],
    [Opcode.FADD]: [R, L],
    [Opcode.FSUB]: [R, L],
    [Opcode.FMULREG]: [R, R],
    [Opcode.FDIVREG]: [R, R],
    [Opcode.FADDREG]: [R, R],
    [Opcode.FSUBREG]: [R, R],
    [Opcode.FGREATER]: [R, R],
    [Opcode.FLESSTHAN]: [R, R],
    [Opcode.FGTE]: [R, R],
    [Opcode.FLTE]: [R, R],
    [Opcode.ZEROMEMORY]: [L],
    [Opcode.CREATESTRING]: [R],
    [Opcode.STRINGSEQUAL]: [R, R],
    [Opcode.STRINGSNOTEQ]: [R, R],
    [Opcode.CHECKNULLREG]: [R],
    [Opcode.LOOPCHECKOFF]: [],
    [Opcode.MEMZEROPTRND]: [],
    [Opcode.JNZ]: [J],
    [Opcode.DYNAMICBOUNDS]: [R],
    [Opcode.NEWARRAY]: [R, L, L],
    [Opcode.NEWUSEROBJECT]: [R, L],
};

/**
 * Lookup table: opcode value -> mnemonic and operand kinds.
 */
export const OPCODE_BY_VALUE: ReadonlyMap<number, OpcodeInfo> = new Map<number, OpcodeInfo>(
    Object.entries(Opcode).map(([mnemonic, value]) => [value, { mnemonic, operands: OPERANDS[value] }]),
);

/**
 * Number of operand cells following an opcode, or -1 for unknown opcodes.
 */
export function getOperandCount(opcode: number): number {
    return OPCODE_BY_VALUE.get(opcode)?.operands.length ?? -1;
}

/**
 * Jumps encode their target relative to the cell after the operand.
 */
export function isRelativeJump(opcode: number): boolean {
    return opcode === Opcode.JMP || opcode === Opcode.JZ || opcode === Opcode.JNZ;
}
