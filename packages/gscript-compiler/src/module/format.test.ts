import { describe, it, expect } from 'vitest';
import { writeModule, exportName, ByteWriter } from './writer.ts';
import { readModule, ByteReader } from './reader.ts';
import { FixupType, ExportType, ModuleFormatError } from './types.ts';
import type { ScriptModule } from './types.ts';

function sampleModule(): ScriptModule {
    return {
        code: Int32Array.from([6, 2, 4, 6, 3, 0, 23, 3, 6, 3, 0, 33, 3, 5]),
        fixups: [
            { codeLoc: 2, type: FixupType.GlobalData, target: 4 },
            { codeLoc: 5, type: FixupType.Function, target: 0 },
            { codeLoc: 10, type: FixupType.Import, target: 0 },
        ],
        globalData: Uint8Array.from([0, 0, 0, 0, 9, 0, 0, 0]),
        strings: Uint8Array.from([104, 105, 0]),
        imports: [
            { name: 'Display', optional: false },
            { name: 'Wait', optional: true },
        ],
        exports: [
            { name: 'start', type: ExportType.Function, address: 0, paramCount: 2 },
            { name: 'score', type: ExportType.Data, address: 4, paramCount: 0 },
        ],
        sections: [{ name: 'main', codeLoc: 0 }],
    };
}

/** One data export at byte 40, its type byte at 50 */
function dataOnlyModule(): ScriptModule {
    return {
        code: Int32Array.from([5]),
        fixups: [],
        globalData: new Uint8Array(4),
        strings: new Uint8Array(0),
        imports: [],
        exports: [{ name: 'score', type: ExportType.Data, address: 0, paramCount: 0 }],
        sections: [],
    };
}

describe('writeModule', () => {
    it('should write the header and segments little-endian', () => {
        const bytes = writeModule(sampleModule());

        expect(Array.from(bytes.slice(0, 20))).toEqual([
            71, 83, 67, 77,     // GSCM
            1, 0, 0, 0,         // version
            8, 0, 0, 0,         // global data bytes
            14, 0, 0, 0,        // code cells
            3, 0, 0, 0,         // string bytes
        ]);
        expect(Array.from(bytes.slice(20, 28))).toEqual([0, 0, 0, 0, 9, 0, 0, 0]);
        expect(Array.from(bytes.slice(28, 32))).toEqual([6, 0, 0, 0]);
        expect(bytes).toHaveLength(170);
        expect(Array.from(bytes.slice(-4))).toEqual([0xFE, 0xCA, 0xEF, 0xBE]);
    });

    it('should write fixup types before their locations', () => {
        const bytes = writeModule(sampleModule());
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

        expect(view.getInt32(87, true)).toBe(3);
        expect(Array.from(bytes.slice(91, 94))).toEqual([1, 2, 4]);
        expect([view.getInt32(94, true), view.getInt32(98, true), view.getInt32(102, true)]).toEqual([2, 5, 10]);
    });

    it('should suffix function exports with their parameter count', () => {
        expect(exportName({ name: 'start', type: ExportType.Function, address: 0, paramCount: 2 })).toBe('start$2');
        expect(exportName({ name: 'score', type: ExportType.Data, address: 4, paramCount: 0 })).toBe('score');
    });
});

describe('readModule', () => {
    it('should read back what was written', () => {
        const module = sampleModule();
        expect(readModule(writeModule(module))).toEqual(module);
    });

    it('should take fixup targets from the code', () => {
        const module = readModule(writeModule(sampleModule()));
        expect(module.fixups.map(f => f.target)).toEqual([4, 0, 0]);
    });

    it('should reject a bad magic', () => {
        const bytes = writeModule(sampleModule());
        bytes[0] = 88;
        expect(() => readModule(bytes)).toThrow("Module format error at byte 0: Bad magic 'XSCM'");
    });

    it('should reject other versions', () => {
        const bytes = writeModule(sampleModule());
        bytes[4] = 2;
        expect(() => readModule(bytes)).toThrow('Unsupported version 2');
    });

    it('should reject unknown fixup types', () => {
        const bytes = writeModule(sampleModule());
        bytes[91] = 9;
        expect(() => readModule(bytes)).toThrow('Unknown fixup type 9');
    });

    it('should reject fixups outside of the code', () => {
        const bytes = writeModule(sampleModule());
        new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setInt32(94, 40, true);
        expect(() => readModule(bytes)).toThrow('Fixup at 40 is outside of the code');
    });

    it('should reject unknown export types', () => {
        const bytes = writeModule(dataOnlyModule());
        bytes[50] = 7;
        expect(() => readModule(bytes)).toThrow('Module format error at byte 40: Unknown export type 7');
    });

    it('should reject function exports without a parameter count', () => {
        const bytes = writeModule(dataOnlyModule());
        bytes[50] = ExportType.Function;
        expect(() => readModule(bytes)).toThrow("Function export 'score' has no parameter count");
    });

    it('should reject truncated input', () => {
        const bytes = writeModule(sampleModule());
        expect(() => readModule(bytes.slice(0, bytes.length - 2))).toThrow(ModuleFormatError);
    });

    it('should reject a wrong end signature', () => {
        const bytes = writeModule(sampleModule());
        bytes[bytes.length - 1] = 0;
        expect(() => readModule(bytes)).toThrow('Bad end signature 0xefcafe');
    });

    it('should reject trailing bytes', () => {
        const bytes = writeModule(sampleModule());
        const longer = new Uint8Array(bytes.length + 1);
        longer.set(bytes);
        expect(() => readModule(longer)).toThrow('1 trailing bytes');
    });
});

describe('ByteWriter and ByteReader', () => {
    it('should grow past the initial buffer', () => {
        const out = new ByteWriter();
        for (let i = 0; i < 100; i++) {
            out.writeInt32(i);
        }
        expect(out.length).toBe(400);

        const input = new ByteReader(out.toBytes());
        input.readBytes(396);
        expect(input.readInt32()).toBe(99);
        expect(input.remaining).toBe(0);
    });

    it('should round-trip C strings', () => {
        const out = new ByteWriter();
        out.writeCString('Ünïcode');
        const input = new ByteReader(out.toBytes());
        expect(input.readCString()).toBe('Ünïcode');
    });

    it('should reject counts larger than the input', () => {
        const out = new ByteWriter();
        out.writeInt32(10);
        expect(() => new ByteReader(out.toBytes()).readCount('import count', 2))
            .toThrow('Module format error at byte 0: Invalid import count 10');
    });
});
