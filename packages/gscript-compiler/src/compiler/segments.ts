/**
 * gscript Data Segments
 *
 * SPDX-License-Identifier: MIT
 *
 * The string repository, the global data segment and the import table of
 * one compilation unit.
 */

import type { StringsLoc, GlobalLoc } from './types.ts';
import { InternalError } from './errors.ts';

const encoder = new TextEncoder();

// ============================================================================
// String Repository
// ============================================================================

/**
 * NUL terminated UTF-8 string literals. Identical texts share one copy.
 */
export class StringRepository {
    private bytes: number[] = [];
    private locations = new Map<string, StringsLoc>();

    add(text: string): StringsLoc {
        const known = this.locations.get(text);
        if (known !== undefined) return known;

        const loc = this.bytes.length;
        for (const byte of encoder.encode(text)) {
            this.bytes.push(byte);
        }
        this.bytes.push(0);
        this.locations.set(text, loc);
        return loc;
    }

    get size(): number {
        return this.bytes.length;
    }

    /** Number of distinct literals */
    get count(): number {
        return this.locations.size;
    }

    toBytes(): Uint8Array {
        return Uint8Array.from(this.bytes);
    }
}

// ============================================================================
// Global Data Segment
// ============================================================================

/**
 * Zero-initialized global storage with optional constant initial values.
 */
export class GlobalDataSegment {
    private buffer = new Uint8Array(64);
    private view = new DataView(this.buffer.buffer);
    private used = 0;

    /**
     * Reserve `size` bytes, rounded up to a multiple of 4.
     */
    allocate(size: number): GlobalLoc {
        const loc = this.used;
        const aligned = Math.ceil(size / 4) * 4;
        this.ensure(loc + aligned);
        this.used += aligned;
        return loc;
    }

    writeInt(loc: GlobalLoc, size: number, value: number): void {
        this.check(loc, size);
        switch (size) {
            case 1:
                this.view.setInt8(loc, value);
                break;
            case 2:
                this.view.setInt16(loc, value, true);
                break;
            case 4:
                this.view.setInt32(loc, value, true);
                break;
            default:
                throw new InternalError(`Cannot write an integer of ${size} bytes`);
        }
    }

    get size(): number {
        return this.used;
    }

    toBytes(): Uint8Array {
        return this.buffer.slice(0, this.used);
    }

    private check(loc: GlobalLoc, size: number): void {
        if (loc < 0 || loc + size > this.used) {
            throw new InternalError(`Global data write at ${loc} (${size} bytes) is out of bounds`);
        }
    }

    private ensure(capacity: number): void {
        if (capacity <= this.buffer.length) return;
        let length = this.buffer.length;
        while (length < capacity) length *= 2;
        const next = new Uint8Array(length);
        next.set(this.buffer);
        this.buffer = next;
        this.view = new DataView(next.buffer);
    }
}

// ============================================================================
// Import Table
// ============================================================================

export interface ImportEntry {
    name: string;
    /** `_tryimport`: the loader may leave it unresolved */
    optional: boolean;
}

/**
 * Names the module expects the loader to resolve.
 */
export class ImportTable {
    private entries: ImportEntry[] = [];
    private indices = new Map<string, number>();

    add(name: string, optional = false): number {
        const known = this.indices.get(name);
        if (known !== undefined) {
            const entry = this.entries[known];
            // A standard import anywhere makes the name mandatory
            if (entry !== undefined && !optional) entry.optional = false;
            return known;
        }
        const index = this.entries.length;
        this.entries.push({ name, optional });
        this.indices.set(name, index);
        return index;
    }

    get size(): number {
        return this.entries.length;
    }

    names(): string[] {
        return this.entries.map(e => e.name);
    }

    all(): readonly ImportEntry[] {
        return this.entries;
    }
}
