/**
 * gscript Module - Binary Writer
 *
 * SPDX-License-Identifier: MIT
 *
 * Serializes a ScriptModule. All multi-byte values are little-endian.
 *
 * File format:
 *   - Header: magic "GSCM", version, global data size, code size (cells),
 *     strings size
 *   - Global data bytes, code cells (int32), string bytes
 *   - Fixups: count, one type byte per fixup, then one CodeLoc per fixup
 *   - Imports: count, then per import a NUL terminated name and an
 *     optional flag byte
 *   - Exports: count, then per export a NUL terminated name, the address
 *     and a type byte; function names carry `$<paramCount>`
 *   - Sections: count, then per section a NUL terminated name and CodeLoc
 *   - End signature
 */

import { ExportType, MODULE_CONSTANTS } from './types.ts';
import type { ScriptModule, ExportEntry } from './types.ts';

const encoder = new TextEncoder();

/**
 * Growable little-endian byte buffer.
 */
export class ByteWriter {
    private buffer = new Uint8Array(256);
    private view = new DataView(this.buffer.buffer);
    private offset = 0;

    get length(): number {
        return this.offset;
    }

    writeUint8(value: number): void {
        this.ensure(1);
        this.view.setUint8(this.offset, value & 0xFF);
        this.offset += 1;
    }

    writeInt32(value: number): void {
        this.ensure(4);
        this.view.setInt32(this.offset, value | 0, true);
        this.offset += 4;
    }

    writeBytes(bytes: Uint8Array): void {
        this.ensure(bytes.length);
        this.buffer.set(bytes, this.offset);
        this.offset += bytes.length;
    }

    /** UTF-8 text followed by a NUL byte */
    writeCString(text: string): void {
        this.writeBytes(encoder.encode(text));
        this.writeUint8(0);
    }

    toBytes(): Uint8Array {
        return this.buffer.slice(0, this.offset);
    }

    private ensure(extra: number): void {
        const needed = this.offset + extra;
        if (needed <= this.buffer.length) return;
        let length = this.buffer.length;
        while (length < needed) length *= 2;
        const next = new Uint8Array(length);
        next.set(this.buffer);
        this.buffer = next;
        this.view = new DataView(next.buffer);
    }
}

/**
 * Name of an export as stored in the file.
 */
export function exportName(entry: ExportEntry): string {
    return entry.type === ExportType.Function ? `${entry.name}$${entry.paramCount}` : entry.name;
}

/**
 * Serialize a module.
 *
 * @param module - Module to write
 * @returns The binary module
 */
export function writeModule(module: ScriptModule): Uint8Array {
    const out = new ByteWriter();

    // =========================================================================
    // Header
    // =========================================================================
    out.writeBytes(encoder.encode(MODULE_CONSTANTS.MAGIC));
    out.writeInt32(MODULE_CONSTANTS.VERSION);
    out.writeInt32(module.globalData.length);
    out.writeInt32(module.code.length);
    out.writeInt32(module.strings.length);

    // =========================================================================
    // Segments
    // =========================================================================
    out.writeBytes(module.globalData);
    for (const cell of module.code) {
        out.writeInt32(cell);
    }
    out.writeBytes(module.strings);

    // =========================================================================
    // Fixups
    // =========================================================================
    out.writeInt32(module.fixups.length);
    for (const fixup of module.fixups) {
        out.writeUint8(fixup.type);
    }
    for (const fixup of module.fixups) {
        out.writeInt32(fixup.codeLoc);
    }

    // =========================================================================
    // Imports and exports
    // =========================================================================
    out.writeInt32(module.imports.length);
    for (const entry of module.imports) {
        out.writeCString(entry.name);
        out.writeUint8(entry.optional ? 1 : 0);
    }

    out.writeInt32(module.exports.length);
    for (const entry of module.exports) {
        out.writeCString(exportName(entry));
        out.writeInt32(entry.address);
        out.writeUint8(entry.type);
    }

    // =========================================================================
    // Sections
    // =========================================================================
    out.writeInt32(module.sections.length);
    for (const section of module.sections) {
        out.writeCString(section.name);
        out.writeInt32(section.codeLoc);
    }

    out.writeInt32(MODULE_CONSTANTS.END_SIGNATURE);
    return out.toBytes();
}
