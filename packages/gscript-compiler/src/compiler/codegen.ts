/**
 * gscript Code Generator
 *
 * SPDX-License-Identifier: MIT
 *
 * Low-level emission into the flat code cell stream: instructions, fixups,
 * labels for relative jumps and tracking of the stack depth. The parser
 * drives these helpers directly as it recognizes constructs.
 */

import type { CodeLoc } from './types.ts';
import { InternalError } from './errors.ts';
import { Opcode, Register, getOperandCount, isRelativeJump } from '../module/opcodes.ts';
import type { OpcodeValue, RegisterValue } from '../module/opcodes.ts';
import type { FixupTypeValue } from '../module/types.ts';

// ============================================================================
// State
// ============================================================================

/**
 * A fixup before its target is read back from the code.
 */
export interface CodeFixup {
    codeLoc: CodeLoc;
    type: FixupTypeValue;
}

/**
 * Jump target. `loc` is -1 until the label is placed.
 */
export interface Label {
    loc: CodeLoc;
    /** Stack depth every jump to this label must have; -1 while unknown */
    depth: number;
    /** Operand cells of jumps waiting for placement */
    pending: CodeLoc[];
}

export interface CodeBuffer {
    code: number[];
    fixups: CodeFixup[];
    /** Fixup type by code cell, for conflict detection */
    fixupTypes: Map<CodeLoc, FixupTypeValue>;
    /** Bytes on the stack above the current function's entry point */
    depth: number;
    lastLine: number;
    emitLineNumbers: boolean;
}

export function createCodeBuffer(emitLineNumbers: boolean): CodeBuffer {
    return {
        code: [],
        fixups: [],
        fixupTypes: new Map(),
        depth: 0,
        lastLine: -1,
        emitLineNumbers,
    };
}

// ============================================================================
// Emission
// ============================================================================

/**
 * Location of the next cell.
 */
export function codeLoc(state: CodeBuffer): CodeLoc {
    return state.code.length;
}

/**
 * Emit one instruction. Returns the location of its opcode cell.
 */
export function emit(state: CodeBuffer, opcode: OpcodeValue, ...args: number[]): CodeLoc {
    if (getOperandCount(opcode) !== args.length) {
        throw new InternalError(`Opcode ${opcode} emitted with ${args.length} operands`);
    }
    const loc = state.code.length;
    state.code.push(opcode, ...args);
    return loc;
}

/**
 * Mark the cell at `loc` for relocation.
 */
export function addFixup(state: CodeBuffer, loc: CodeLoc, type: FixupTypeValue): void {
    if (loc < 0 || loc >= state.code.length) {
        throw new InternalError(`Fixup at ${loc} is outside of the code (${state.code.length} cells)`);
    }
    const existing = state.fixupTypes.get(loc);
    if (existing !== undefined) {
        if (existing !== type) {
            throw new InternalError(`Conflicting fixups of type ${existing} and ${type} at ${loc}`);
        }
        return;
    }
    state.fixupTypes.set(loc, type);
    state.fixups.push({ codeLoc: loc, type });
}

/**
 * `LITTOREG reg, value` whose value is relocated. Returns the operand cell.
 */
export function emitRelocated(
    state: CodeBuffer,
    register: RegisterValue,
    value: number,
    type: FixupTypeValue,
): CodeLoc {
    const operand = emit(state, Opcode.LITTOREG, register, value) + 2;
    addFixup(state, operand, type);
    return operand;
}

export function patchCell(state: CodeBuffer, loc: CodeLoc, value: number): void {
    if (loc < 0 || loc >= state.code.length) {
        throw new InternalError(`Cannot patch cell ${loc}`);
    }
    state.code[loc] = value;
}

/**
 * Emit `LINENUM` when the line changed and line numbers are enabled.
 */
export function emitLineNumber(state: CodeBuffer, line: number): void {
    if (!state.emitLineNumbers || line === state.lastLine) return;
    state.lastLine = line;
    emit(state, Opcode.LINENUM, line);
}

// ============================================================================
// Stack
// ============================================================================

export function pushReg(state: CodeBuffer, register: RegisterValue): void {
    emit(state, Opcode.PUSHREG, register);
    state.depth += 4;
}

export function popReg(state: CodeBuffer, register: RegisterValue): void {
    emit(state, Opcode.POPREG, register);
    state.depth -= 4;
}

export function growStack(state: CodeBuffer, bytes: number): void {
    if (bytes === 0) return;
    emit(state, Opcode.ADD, Register.SP, bytes);
    state.depth += bytes;
}

export function shrinkStack(state: CodeBuffer, bytes: number): void {
    if (bytes === 0) return;
    if (bytes > state.depth) {
        throw new InternalError(`Stack underflow: releasing ${bytes} of ${state.depth} bytes`);
    }
    emit(state, Opcode.SUB, Register.SP, bytes);
    state.depth -= bytes;
}

/**
 * Release stack on a path that leaves the current block (break, continue,
 * return). The tracked depth stays, since code after the jump still runs
 * at it.
 */
export function unwindStack(state: CodeBuffer, bytes: number): void {
    if (bytes === 0) return;
    emit(state, Opcode.SUB, Register.SP, bytes);
}

/**
 * `LOADSPOFFS` for a frame position. Positions are relative to the
 * function's entry point; parameters are negative.
 */
export function loadFrameAddress(state: CodeBuffer, position: number): void {
    emit(state, Opcode.LOADSPOFFS, state.depth - position);
}

// ============================================================================
// Labels
// ============================================================================

export function newLabel(): Label {
    return { loc: -1, depth: -1, pending: [] };
}

/**
 * Place `label` at the current location and resolve the jumps to it.
 */
export function placeLabel(state: CodeBuffer, label: Label): void {
    if (label.loc >= 0) {
        throw new InternalError('Label placed twice');
    }
    checkLabelDepth(label, state.depth);
    label.loc = state.code.length;
    for (const operand of label.pending) {
        state.code[operand] = label.loc - (operand + 1);
    }
    label.pending = [];
}

/**
 * Emit a relative jump. `depth` is the stack depth in effect at the target
 * when it differs from the tracked one (after unwindStack).
 */
export function emitJump(state: CodeBuffer, opcode: OpcodeValue, label: Label, depth = state.depth): void {
    if (!isRelativeJump(opcode)) {
        throw new InternalError(`Opcode ${opcode} is not a jump`);
    }
    checkLabelDepth(label, depth);
    const operand = emit(state, opcode, 0) + 1;
    if (label.loc >= 0) {
        state.code[operand] = label.loc - (operand + 1);
    } else {
        label.pending.push(operand);
    }
}

function checkLabelDepth(label: Label, depth: number): void {
    if (label.depth < 0) {
        label.depth = depth;
    } else if (label.depth !== depth) {
        throw new InternalError(`Stack depth ${depth} at a jump does not match ${label.depth} at its label`);
    }
}

// ============================================================================
// Values
// ============================================================================

const floatView = new DataView(new ArrayBuffer(4));

/**
 * The cell holding a float, i.e. its IEEE 754 single precision bits.
 */
export function floatToCell(value: number): number {
    floatView.setFloat32(0, value, true);
    return floatView.getInt32(0, true);
}

export function cellToFloat(cell: number): number {
    floatView.setInt32(0, cell, true);
    return floatView.getFloat32(0, true);
}
