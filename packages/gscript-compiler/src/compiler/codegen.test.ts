import { describe, it, expect } from 'vitest';
import {
    createCodeBuffer,
    emit,
    addFixup,
    emitRelocated,
    emitLineNumber,
    pushReg,
    popReg,
    growStack,
    shrinkStack,
    unwindStack,
    loadFrameAddress,
    newLabel,
    placeLabel,
    emitJump,
    floatToCell,
    cellToFloat,
} from './codegen.ts';
import { InternalError } from './errors.ts';
import { Opcode, Register } from '../module/opcodes.ts';
import { FixupType } from '../module/types.ts';

describe('emit', () => {
    it('should append the opcode and its operands', () => {
        const state = createCodeBuffer(false);
        expect(emit(state, Opcode.LITTOREG, Register.AX, 7)).toBe(0);
        expect(emit(state, Opcode.RET)).toBe(3);
        expect(state.code).toEqual([6, 3, 7, 5]);
    });

    it('should reject a wrong operand count', () => {
        const state = createCodeBuffer(false);
        expect(() => emit(state, Opcode.RET, 1)).toThrow(InternalError);
    });

    it('should emit line numbers only when they change', () => {
        const state = createCodeBuffer(true);
        emitLineNumber(state, 3);
        emitLineNumber(state, 3);
        emitLineNumber(state, 4);
        expect(state.code).toEqual([36, 3, 36, 4]);

        const quiet = createCodeBuffer(false);
        emitLineNumber(quiet, 3);
        expect(quiet.code).toEqual([]);
    });
});

describe('fixups', () => {
    it('should record the operand cell of a relocated literal once', () => {
        const state = createCodeBuffer(false);
        expect(emitRelocated(state, Register.AX, 12, FixupType.GlobalData)).toBe(2);
        addFixup(state, 2, FixupType.GlobalData);

        expect(state.code).toEqual([6, 3, 12]);
        expect(state.fixups).toEqual([{ codeLoc: 2, type: FixupType.GlobalData }]);
    });

    it('should reject conflicting types on one cell', () => {
        const state = createCodeBuffer(false);
        emitRelocated(state, Register.AX, 12, FixupType.GlobalData);
        expect(() => addFixup(state, 2, FixupType.String)).toThrow('Conflicting fixups of type 1 and 3 at 2');
    });

    it('should reject cells outside the code', () => {
        const state = createCodeBuffer(false);
        emit(state, Opcode.LITTOREG, Register.AX, 0);
        expect(() => addFixup(state, 10, FixupType.Function)).toThrow('Fixup at 10 is outside of the code (3 cells)');
    });
});

describe('stack tracking', () => {
    it('should follow pushes, pops and explicit growth', () => {
        const state = createCodeBuffer(false);
        pushReg(state, Register.AX);
        growStack(state, 8);
        expect(state.depth).toBe(12);
        shrinkStack(state, 8);
        popReg(state, Register.BX);

        expect(state.depth).toBe(0);
        expect(state.code).toEqual([29, 3, 1, 1, 8, 2, 1, 8, 30, 4]);
    });

    it('should emit nothing for zero sized changes', () => {
        const state = createCodeBuffer(false);
        growStack(state, 0);
        shrinkStack(state, 0);
        unwindStack(state, 0);
        expect(state.code).toEqual([]);
    });

    it('should keep the tracked depth when unwinding', () => {
        const state = createCodeBuffer(false);
        growStack(state, 4);
        unwindStack(state, 4);
        expect(state.depth).toBe(4);
        expect(state.code).toEqual([1, 1, 4, 2, 1, 4]);
    });

    it('should refuse to release more than was pushed', () => {
        const state = createCodeBuffer(false);
        expect(() => shrinkStack(state, 4)).toThrow('Stack underflow: releasing 4 of 0 bytes');
    });

    it('should address frame positions relative to the current depth', () => {
        const state = createCodeBuffer(false);
        growStack(state, 8);
        loadFrameAddress(state, -8);
        loadFrameAddress(state, 0);
        expect(state.code.slice(3)).toEqual([51, 16, 51, 8]);
    });
});

describe('labels', () => {
    it('should resolve a forward jump on placement', () => {
        const state = createCodeBuffer(false);
        const label = newLabel();
        emitJump(state, Opcode.JMP, label);
        emit(state, Opcode.LITTOREG, Register.AX, 5);
        placeLabel(state, label);

        expect(label.loc).toBe(5);
        expect(state.code).toEqual([31, 3, 6, 3, 5]);
    });

    it('should encode a backward jump immediately', () => {
        const state = createCodeBuffer(false);
        const label = newLabel();
        placeLabel(state, label);
        emit(state, Opcode.RET);
        emitJump(state, Opcode.JZ, label);
        expect(state.code).toEqual([5, 28, -3]);
    });

    it('should require the same stack depth at jump and label', () => {
        const state = createCodeBuffer(false);
        const label = newLabel();
        emitJump(state, Opcode.JMP, label);
        pushReg(state, Register.AX);
        expect(() => placeLabel(state, label)).toThrow('Stack depth 4 at a jump does not match 0 at its label');
    });

    it('should accept an explicit depth for jumps after unwinding', () => {
        const state = createCodeBuffer(false);
        const label = newLabel();
        growStack(state, 4);
        unwindStack(state, 4);
        emitJump(state, Opcode.JMP, label, 0);
        expect(label.depth).toBe(0);
    });

    it('should reject placing a label twice and non-jump opcodes', () => {
        const state = createCodeBuffer(false);
        const label = newLabel();
        placeLabel(state, label);
        expect(() => placeLabel(state, label)).toThrow('Label placed twice');
        expect(() => emitJump(state, Opcode.RET, label)).toThrow(InternalError);
    });
});

describe('float cells', () => {
    it('should store single precision bits', () => {
        expect(floatToCell(1)).toBe(0x3F800000);
        expect(floatToCell(-2)).toBe(-1073741824);
        expect(cellToFloat(floatToCell(1.5))).toBe(1.5);
    });
});
