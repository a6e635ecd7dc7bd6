/**
 * gscript Module - Type Definitions
 *
 * SPDX-License-Identifier: MIT
 */

/**
 * How the loader patches a code cell.
 */
export const FixupType = {
    /** Cell holds a GlobalLoc; add the base of global data */
    GlobalData: 1,
    /** Cell holds a CodeLoc; add the base of code */
    Function: 2,
    /** Cell holds a StringsLoc; add the base of the string repository */
    String: 3,
    /** Cell holds an import index; replace with the bound address */
    Import: 4,
    /** Cell holds a stack offset; add the base of the stack */
    Stack: 6,
} as const;

export type FixupTypeValue = typeof FixupType[keyof typeof FixupType];

export const FIXUP_TYPE_NAMES: Record<FixupTypeValue, string> = {
    [FixupType.GlobalData]: 'data',
    [FixupType.Function]: 'code',
    [FixupType.String]: 'string',
    [FixupType.Import]: 'import',
    [FixupType.Stack]: 'stack',
};

export function isFixupType(value: number): value is FixupTypeValue {
    return value in FIXUP_TYPE_NAMES;
}

/**
 * A deferred relocation of one code cell.
 */
export interface Fixup {
    codeLoc: number;
    type: FixupTypeValue;
    /** The unpatched cell value: GlobalLoc, CodeLoc, StringsLoc or import index */
    target: number;
}

export const ExportType = {
    Function: 1,
    Data: 2,
} as const;

export type ExportTypeValue = typeof ExportType[keyof typeof ExportType];

export interface ExportEntry {
    name: string;
    type: ExportTypeValue;
    /** CodeLoc of a function, GlobalLoc of a variable */
    address: number;
    /** Parameter count of a function; 0 for data */
    paramCount: number;
}

export interface ImportRecord {
    name: string;
    /** Declared with `_tryimport`: may stay unresolved */
    optional: boolean;
}

/**
 * Start of a source section in the code.
 */
export interface SectionMark {
    name: string;
    codeLoc: number;
}

/**
 * A compiled, relocatable script module.
 */
export interface ScriptModule {
    code: Int32Array;
    fixups: Fixup[];
    /** Initial content of global data; its length is the segment size */
    globalData: Uint8Array;
    /** NUL terminated UTF-8 string literals */
    strings: Uint8Array;
    imports: ImportRecord[];
    exports: ExportEntry[];
    sections: SectionMark[];
}

export const MODULE_CONSTANTS = {
    MAGIC: 'GSCM',
    VERSION: 1,
    END_SIGNATURE: 0xBEEFCAFE,
    /** Section marks `<section>$init` start code run when the module loads */
    INITIALIZER_SUFFIX: '$init',
} as const;

/**
 * Malformed binary module.
 */
export class ModuleFormatError extends Error {
    offset: number;

    constructor(message: string, offset = 0) {
        super(`Module format error at byte ${offset}: ${message}`);
        this.name = 'ModuleFormatError';
        this.offset = offset;
    }
}

/**
 * An import the loader cannot bind.
 */
export class LinkError extends Error {
    symbol: string;

    constructor(message: string, symbol = '') {
        super(message);
        this.name = 'LinkError';
        this.symbol = symbol;
    }
}
