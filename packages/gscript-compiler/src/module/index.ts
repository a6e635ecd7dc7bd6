/**
 * gscript Module
 *
 * SPDX-License-Identifier: MIT
 *
 * Instruction set, in-memory module, binary format, linking and
 * disassembly.
 */

export { Opcode, Register, REGISTER_NAMES, OPCODE_BY_VALUE, getOperandCount, isRelativeJump } from './opcodes.ts';
export type { OpcodeValue, RegisterValue, OperandKind, OpcodeInfo } from './opcodes.ts';
export {
    FixupType,
    FIXUP_TYPE_NAMES,
    ExportType,
    MODULE_CONSTANTS,
    ModuleFormatError,
    LinkError,
    isFixupType,
} from './types.ts';
export type {
    FixupTypeValue,
    Fixup,
    ExportTypeValue,
    ExportEntry,
    ImportRecord,
    SectionMark,
    ScriptModule,
} from './types.ts';
export { ByteWriter, writeModule, exportName } from './writer.ts';
export { ByteReader, readModule } from './reader.ts';
export { validateFixups, linkModule, initializerEntries } from './linker.ts';
export type { LinkBases, ImportResolver } from './linker.ts';
export { decodeInstructions, formatInstruction, disassemble } from './disassembler.ts';
export type { DisassembledInstruction } from './disassembler.ts';
