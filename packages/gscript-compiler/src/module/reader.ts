/**
 * gscript Module - Binary Reader
 *
 * SPDX-License-Identifier: MIT
 *
 * Parses the format written by writeModule(). Fixup targets are read back
 * from the code cells they patch.
 */

import { ExportType, MODULE_CONSTANTS, ModuleFormatError, isFixupType } from './types.ts';
import type { ScriptModule, Fixup, ExportEntry, ExportTypeValue, ImportRecord, SectionMark } from './types.ts';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Bounds-checked little-endian cursor over a byte array.
 */
export class ByteReader {
    private readonly bytes: Uint8Array;
    private readonly view: DataView;
    private offset = 0;

    constructor(bytes: Uint8Array) {
        this.bytes = bytes;
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get position(): number {
        return this.offset;
    }

    get remaining(): number {
        return this.bytes.length - this.offset;
    }

    readUint8(): number {
        this.require(1, 'a byte');
        const value = this.view.getUint8(this.offset);
        this.offset += 1;
        return value;
    }

    readInt32(): number {
        this.require(4, 'a 32-bit value');
        const value = this.view.getInt32(this.offset, true);
        this.offset += 4;
        return value;
    }

    readUint32(): number {
        this.require(4, 'a 32-bit value');
        const value = this.view.getUint32(this.offset, true);
        this.offset += 4;
        return value;
    }

    /**
     * A count or size: non-negative and small enough for the rest of the
     * input at `unitSize` bytes per unit.
     */
    readCount(what: string, unitSize: number): number {
        const start = this.offset;
        const count = this.readInt32();
        if (count < 0 || count * unitSize > this.remaining) {
            throw new ModuleFormatError(`Invalid ${what} ${count}`, start);
        }
        return count;
    }

    readBytes(length: number): Uint8Array {
        this.require(length, `${length} bytes`);
        const slice = this.bytes.slice(this.offset, this.offset + length);
        this.offset += length;
        return slice;
    }

    readCString(): string {
        const start = this.offset;
        const end = this.bytes.indexOf(0, start);
        if (end < 0) {
            throw new ModuleFormatError('Unterminated string', start);
        }
        this.offset = end + 1;
        try {
            return decoder.decode(this.bytes.subarray(start, end));
        } catch {
            throw new ModuleFormatError('Invalid UTF-8 in string', start);
        }
    }

    private require(length: number, what: string): void {
        if (this.offset + length > this.bytes.length) {
            throw new ModuleFormatError(`Unexpected end of input, expected ${what}`, this.offset);
        }
    }
}

function isExportType(value: number): value is ExportTypeValue {
    return value === ExportType.Function || value === ExportType.Data;
}

function parseExportName(name: string, type: ExportTypeValue, at: number): { name: string; paramCount: number } {
    if (type !== ExportType.Function) return { name, paramCount: 0 };
    const match = /^(.*)\$(\d+)$/.exec(name);
    if (match === null) {
        throw new ModuleFormatError(`Function export '${name}' has no parameter count`, at);
    }
    return { name: match[1] ?? '', paramCount: Number.parseInt(match[2] ?? '0', 10) };
}

/**
 * Parse a binary module.
 *
 * @throws ModuleFormatError on any malformed input
 */
export function readModule(bytes: Uint8Array): ScriptModule {
    const input = new ByteReader(bytes);

    // =========================================================================
    // Header
    // =========================================================================
    const magic = String.fromCharCode(...input.readBytes(4));
    if (magic !== MODULE_CONSTANTS.MAGIC) {
        throw new ModuleFormatError(`Bad magic '${magic}'`, 0);
    }
    const version = input.readInt32();
    if (version !== MODULE_CONSTANTS.VERSION) {
        throw new ModuleFormatError(`Unsupported version ${version}`, 4);
    }
    const globalSize = input.readCount('global data size', 1);
    const codeSize = input.readCount('code size', 4);
    const stringsSize = input.readCount('strings size', 1);

    // =========================================================================
    // Segments
    // =========================================================================
    const globalData = input.readBytes(globalSize);
    const code = new Int32Array(codeSize);
    for (let i = 0; i < codeSize; i++) {
        code[i] = input.readInt32();
    }
    const strings = input.readBytes(stringsSize);

    // =========================================================================
    // Fixups
    // =========================================================================
    const fixupCount = input.readCount('fixup count', 5);
    const types: number[] = [];
    for (let i = 0; i < fixupCount; i++) {
        types.push(input.readUint8());
    }
    const fixups: Fixup[] = [];
    for (const type of types) {
        const at = input.position;
        const codeLoc = input.readInt32();
        if (!isFixupType(type)) {
            throw new ModuleFormatError(`Unknown fixup type ${type}`, at);
        }
        if (codeLoc < 0 || codeLoc >= codeSize) {
            throw new ModuleFormatError(`Fixup at ${codeLoc} is outside of the code`, at);
        }
        fixups.push({ codeLoc, type, target: code[codeLoc] ?? 0 });
    }

    // =========================================================================
    // Imports and exports
    // =========================================================================
    const importCount = input.readCount('import count', 2);
    const imports: ImportRecord[] = [];
    for (let i = 0; i < importCount; i++) {
        const name = input.readCString();
        imports.push({ name, optional: input.readUint8() !== 0 });
    }

    const exportCount = input.readCount('export count', 6);
    const exports: ExportEntry[] = [];
    for (let i = 0; i < exportCount; i++) {
        const at = input.position;
        const rawName = input.readCString();
        const address = input.readInt32();
        const type = input.readUint8();
        if (!isExportType(type)) {
            throw new ModuleFormatError(`Unknown export type ${type}`, at);
        }
        const { name, paramCount } = parseExportName(rawName, type, at);
        exports.push({ name, type, address, paramCount });
    }

    // =========================================================================
    // Sections
    // =========================================================================
    const sectionCount = input.readCount('section count', 5);
    const sections: SectionMark[] = [];
    for (let i = 0; i < sectionCount; i++) {
        const name = input.readCString();
        sections.push({ name, codeLoc: input.readInt32() });
    }

    const signatureAt = input.position;
    const signature = input.readUint32();
    if (signature !== MODULE_CONSTANTS.END_SIGNATURE) {
        throw new ModuleFormatError(`Bad end signature 0x${signature.toString(16)}`, signatureAt);
    }
    if (input.remaining > 0) {
        throw new ModuleFormatError(`${input.remaining} trailing bytes`, input.position);
    }

    return { code, fixups, globalData, strings, imports, exports, sections };
}
