/**
 * gscript Qualifier and Flag Sets
 *
 * SPDX-License-Identifier: MIT
 *
 * Typed sets over named bits. The numeric layout is only observable
 * through toBits()/fromBits().
 */

// ============================================================================
// Bit Layouts
// ============================================================================

export const TypeQualifierBit = {
    attribute: 1 << 0,
    autoptr: 1 << 1,
    builtin: 1 << 2,
    const: 1 << 3,
    importstd: 1 << 4,
    importtry: 1 << 5,
    managed: 1 << 6,
    protected: 1 << 7,
    readonly: 1 << 8,
    static: 1 << 9,
    stringstruct: 1 << 10,
    writeprotected: 1 << 11,
} as const;

export type TypeQualifier = keyof typeof TypeQualifierBit;

/** Both import flavours; "is imported" is one mask test against this */
export const IMPORT_MASK = TypeQualifierBit.importstd | TypeQualifierBit.importtry;

export const SymbolFlagBit = {
    accessed: 1 << 0,
    noloopcheck: 1 << 1,
    structautoptr: 1 << 2,
    structbuiltin: 1 << 3,
    structmember: 1 << 4,
    structmanaged: 1 << 5,
    structvartype: 1 << 6,
    exported: 1 << 7,
} as const;

export type SymbolFlag = keyof typeof SymbolFlagBit;

// ============================================================================
// Flag Set
// ============================================================================

/**
 * A set of named flags backed by an integer mask.
 */
class FlagSet<K extends string> {
    protected bits: number;
    private readonly layout: Readonly<Record<K, number>>;

    protected constructor(layout: Readonly<Record<K, number>>, bits: number) {
        this.layout = layout;
        this.bits = bits;
    }

    has(flag: K): boolean {
        return (this.bits & this.layout[flag]) !== 0;
    }

    hasAny(...flags: K[]): boolean {
        return flags.some(flag => this.has(flag));
    }

    /**
     * Add a flag. Adding one that is already set is a no-op.
     */
    add(...flags: K[]): this {
        for (const flag of flags) {
            this.bits |= this.layout[flag];
        }
        return this;
    }

    delete(...flags: K[]): this {
        for (const flag of flags) {
            this.bits &= ~this.layout[flag];
        }
        return this;
    }

    isEmpty(): boolean {
        return this.bits === 0;
    }

    /** Names of the flags that are set, in bit order */
    values(): K[] {
        const names = Object.keys(this.layout).filter((name): name is K => name in this.layout);
        return names
            .filter(name => this.has(name))
            .sort((a, b) => this.layout[a] - this.layout[b]);
    }

    toBits(): number {
        return this.bits;
    }

    equals(other: FlagSet<K>): boolean {
        return this.bits === other.bits;
    }
}

/**
 * Modifiers attached to a symbol or vartype.
 */
export class TypeQualifierSet extends FlagSet<TypeQualifier> {
    constructor(bits = 0) {
        super(TypeQualifierBit, bits);
    }

    static of(...qualifiers: TypeQualifier[]): TypeQualifierSet {
        return new TypeQualifierSet().add(...qualifiers);
    }

    static fromBits(bits: number): TypeQualifierSet {
        return new TypeQualifierSet(bits);
    }

    isImport(): boolean {
        return (this.bits & IMPORT_MASK) !== 0;
    }

    clone(): TypeQualifierSet {
        return new TypeQualifierSet(this.bits);
    }
}

/**
 * Per-symbol bookkeeping bits, orthogonal to the qualifiers.
 */
export class SymbolFlagSet extends FlagSet<SymbolFlag> {
    constructor(bits = 0) {
        super(SymbolFlagBit, bits);
    }

    static of(...flags: SymbolFlag[]): SymbolFlagSet {
        return new SymbolFlagSet().add(...flags);
    }

    static fromBits(bits: number): SymbolFlagSet {
        return new SymbolFlagSet(bits);
    }

    clone(): SymbolFlagSet {
        return new SymbolFlagSet(this.bits);
    }
}

// ============================================================================
// Qualifier Rules
// ============================================================================

/**
 * Qualifier pairs that may not be combined on one declaration.
 */
export const CONFLICTING_QUALIFIERS: ReadonlyArray<readonly [TypeQualifier, TypeQualifier]> = [
    ['const', 'writeprotected'],
    ['const', 'readonly'],
    ['protected', 'writeprotected'],
    ['importstd', 'importtry'],
];

/**
 * Find a qualifier in `set` that conflicts with `incoming`.
 */
export function findConflictingQualifier(set: TypeQualifierSet, incoming: TypeQualifier): TypeQualifier | undefined {
    for (const [a, b] of CONFLICTING_QUALIFIERS) {
        if (incoming === a && set.has(b)) return b;
        if (incoming === b && set.has(a)) return a;
    }
    return undefined;
}
