/**
 * gscript Type Registry
 *
 * SPDX-License-Identifier: MIT
 *
 * Arena of vartypes. Built-ins are registered first with fixed ids; structs
 * start out incomplete when forward-declared and are completed exactly once.
 * Pointer types are interned per target struct.
 */

import { SymbolType, ScopeType, Sizes, describeSymbolType } from './types.ts';
import type { Symbol, Vartype } from './types.ts';
import { TypeQualifierSet } from './flags.ts';
import type { TypeQualifier } from './flags.ts';
import { UserError, InternalError } from './errors.ts';
import type { SymbolTable } from './symbol-table.ts';

// ============================================================================
// Type Definitions
// ============================================================================

export type MemberKind = 'field' | 'function' | 'attribute';

/**
 * One component of a struct.
 */
export interface StructMember {
    readonly name: string;
    /** The qualified symbol, `Struct::name` */
    readonly symbol: Symbol;
    readonly kind: MemberKind;
    /** Field type, function return type or attribute type */
    readonly vartype: Vartype;
    /** Byte offset of a field; 0 for functions and attributes */
    readonly offset: number;
    readonly qualifiers: TypeQualifierSet;
}

export type StructLayout =
    | { readonly state: 'incomplete' }
    | {
        readonly state: 'complete';
        readonly size: number;
        readonly members: ReadonlyMap<string, StructMember>;
    };

interface TypeBase {
    readonly id: Vartype;
    readonly name: string;
}

export interface PrimitiveType extends TypeBase {
    readonly kind: 'void' | 'int' | 'float' | 'string' | 'null';
    readonly size: number;
}

export interface EnumType extends TypeBase {
    readonly kind: 'enum';
    readonly symbol: Symbol;
}

export interface StructType extends TypeBase {
    readonly kind: 'struct';
    readonly symbol: Symbol;
    readonly qualifiers: TypeQualifierSet;
    layout: StructLayout;
}

export interface PointerType extends TypeBase {
    readonly kind: 'pointer';
    readonly target: Vartype;
}

export type TypeEntry = PrimitiveType | EnumType | StructType | PointerType;

/**
 * Ids of the pre-registered types.
 */
export const BuiltinType = {
    Void: 0,
    Char: 1,
    Short: 2,
    Int: 3,
    Long: 4,
    Float: 5,
    Bool: 6,
    String: 7,
    Null: 8,
    StringStruct: 9,
} as const;

/** Qualifiers that must agree between a forward declaration and the definition */
const STRUCT_KIND_QUALIFIERS: TypeQualifier[] = ['managed', 'builtin', 'autoptr', 'stringstruct'];

// ============================================================================
// Type Registry
// ============================================================================

export class TypeRegistry {
    private types: TypeEntry[] = [];
    private pointers = new Map<Vartype, Vartype>();
    private readonly symbols: SymbolTable;

    constructor(symbols: SymbolTable) {
        this.symbols = symbols;

        this.addPrimitive('void', 'void', 0, true);
        this.addPrimitive('char', 'int', Sizes.CHAR, true);
        this.addPrimitive('short', 'int', Sizes.SHORT, true);
        this.addPrimitive('int', 'int', Sizes.INT, true);
        this.addPrimitive('long', 'int', Sizes.LONG, true);
        this.addPrimitive('float', 'float', Sizes.FLOAT, true);

        const bool = this.declareEnum(symbols.add('bool'));
        this.addConstant('false', bool, 0);
        this.addConstant('true', bool, 1);

        this.addPrimitive('string', 'string', Sizes.DYNPOINTER, true);
        const nullType = this.addPrimitive('null', 'null', Sizes.DYNPOINTER, false);
        this.addConstant('null', nullType, 0);

        this.declareStruct(
            symbols.add('String'),
            TypeQualifierSet.of('managed', 'autoptr', 'builtin', 'stringstruct'),
        );
    }

    private addPrimitive(name: string, kind: PrimitiveType['kind'], size: number, named: boolean): Vartype {
        const id = this.types.length;
        this.types.push({ id, name, kind, size });
        if (named) {
            const entry = this.symbols.get(this.symbols.add(name, SymbolType.Vartype));
            entry.vartype = id;
        }
        return id;
    }

    private addConstant(name: string, vartype: Vartype, value: number): void {
        const entry = this.symbols.get(this.symbols.add(name, SymbolType.Constant));
        entry.vartype = vartype;
        entry.value = value;
        entry.scope = ScopeType.None;
    }

    get size(): number {
        return this.types.length;
    }

    get(vartype: Vartype): TypeEntry {
        const entry = this.types[vartype];
        if (entry === undefined) {
            throw new InternalError(`Unknown vartype ${vartype}`);
        }
        return entry;
    }

    // ========================================================================
    // Declaration
    // ========================================================================

    /**
     * Register `symbol` as an incomplete struct, or return the struct it
     * already names.
     */
    declareStruct(symbol: Symbol, qualifiers: TypeQualifierSet): Vartype {
        const entry = this.symbols.get(symbol);

        if (entry.type === SymbolType.UndefinedStruct || entry.type === SymbolType.Vartype) {
            const existing = this.types[entry.vartype];
            if (existing === undefined || existing.kind !== 'struct') {
                throw new UserError(`'${entry.name}' is already declared as a non-struct type`);
            }
            for (const qualifier of STRUCT_KIND_QUALIFIERS) {
                if (existing.qualifiers.has(qualifier) !== qualifiers.has(qualifier)) {
                    throw new UserError(
                        `Struct '${entry.name}' was declared before with different qualifiers ('${qualifier}')`,
                    );
                }
            }
            return existing.id;
        }
        if (entry.type !== SymbolType.NoType) {
            throw new UserError(`'${entry.name}' is already declared as ${describeSymbolType(entry.type)}`);
        }
        if (qualifiers.has('autoptr') && !qualifiers.has('managed')) {
            throw new UserError(`Struct '${entry.name}' is 'autoptr' but not 'managed'`);
        }
        if (qualifiers.has('stringstruct')) {
            const current = this.stringStruct();
            if (current !== undefined) {
                throw new UserError(
                    `'${entry.name}' cannot be the internal string struct, '${this.get(current).name}' already is`,
                );
            }
        }

        const id = this.types.length;
        this.types.push({
            id,
            name: entry.name,
            kind: 'struct',
            symbol,
            qualifiers: qualifiers.clone(),
            layout: { state: 'incomplete' },
        });

        this.symbols.refine(symbol, SymbolType.UndefinedStruct);
        entry.vartype = id;
        entry.qualifiers = qualifiers.clone();
        entry.flags.add('structvartype');
        if (qualifiers.has('managed')) entry.flags.add('structmanaged');
        if (qualifiers.has('autoptr')) entry.flags.add('structautoptr');
        if (qualifiers.has('builtin')) entry.flags.add('structbuiltin');
        return id;
    }

    /**
     * Complete a struct with its final layout. A struct is completed once.
     */
    completeStruct(vartype: Vartype, members: readonly StructMember[], size: number): void {
        const struct = this.struct(vartype);
        if (struct.layout.state === 'complete') {
            throw new InternalError(`Struct '${struct.name}' is completed twice`);
        }
        struct.layout = {
            state: 'complete',
            size,
            members: new Map(members.map(m => [m.name, m])),
        };
        this.symbols.refine(struct.symbol, SymbolType.Vartype);
        if (members.length > 0) {
            this.symbols.setFlag(struct.symbol, 'structmember');
        }
    }

    declareEnum(symbol: Symbol): Vartype {
        const entry = this.symbols.get(symbol);
        if (entry.type !== SymbolType.NoType) {
            throw new UserError(`'${entry.name}' is already declared as ${describeSymbolType(entry.type)}`);
        }
        const id = this.types.length;
        this.types.push({ id, name: entry.name, kind: 'enum', symbol });
        this.symbols.refine(symbol, SymbolType.Vartype);
        entry.vartype = id;
        return id;
    }

    /**
     * The interned pointer type to a managed struct.
     */
    pointerTo(target: Vartype): Vartype {
        const existing = this.pointers.get(target);
        if (existing !== undefined) return existing;

        const type = this.get(target);
        if (type.kind !== 'struct' || !type.qualifiers.has('managed')) {
            throw new UserError(`Cannot point to '${this.describe(target)}': only managed structs can be pointed to`);
        }
        const id = this.types.length;
        this.types.push({ id, name: `${type.name}*`, kind: 'pointer', target });
        this.pointers.set(target, id);
        return id;
    }

    // ========================================================================
    // Queries
    // ========================================================================

    struct(vartype: Vartype): StructType {
        const type = this.get(vartype);
        if (type.kind !== 'struct') {
            throw new InternalError(`Vartype '${type.name}' is not a struct`);
        }
        return type;
    }

    /**
     * Struct behind a pointer, or the struct itself.
     */
    baseStruct(vartype: Vartype): StructType | undefined {
        const type = this.get(vartype);
        if (type.kind === 'pointer') return this.struct(type.target);
        return type.kind === 'struct' ? type : undefined;
    }

    isComplete(vartype: Vartype): boolean {
        const type = this.get(vartype);
        return type.kind !== 'struct' || type.layout.state === 'complete';
    }

    /**
     * Throw a user error naming the struct when `vartype` is incomplete.
     */
    requireComplete(vartype: Vartype, usage: string): void {
        const type = this.get(vartype);
        if (type.kind === 'struct' && type.layout.state === 'incomplete') {
            throw new UserError(`${usage} requires a complete type, but struct '${type.name}' is incomplete`);
        }
    }

    /**
     * Size of a value of this type in bytes.
     */
    sizeOf(vartype: Vartype, usage = 'Using this type'): number {
        const type = this.get(vartype);
        switch (type.kind) {
            case 'void':
            case 'int':
            case 'float':
            case 'string':
            case 'null':
                return type.size;
            case 'enum':
                return Sizes.INT;
            case 'pointer':
                return Sizes.DYNPOINTER;
            case 'struct':
                this.requireComplete(vartype, usage);
                return type.layout.state === 'complete' ? type.layout.size : 0;
        }
    }

    findMember(vartype: Vartype, name: string, usage: string): StructMember | undefined {
        const struct = this.struct(vartype);
        this.requireComplete(vartype, usage);
        return struct.layout.state === 'complete' ? struct.layout.members.get(name) : undefined;
    }

    /**
     * The struct flagged as the internal string type, if any.
     */
    stringStruct(): Vartype | undefined {
        return this.types.find(t => t.kind === 'struct' && t.qualifiers.has('stringstruct'))?.id;
    }

    isVoid(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'void';
    }

    /** Integer family: char, short, int, long, bool and enums */
    isInteger(vartype: Vartype): boolean {
        const kind = this.get(vartype).kind;
        return kind === 'int' || kind === 'enum';
    }

    isFloat(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'float';
    }

    isNull(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'null';
    }

    isLiteralString(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'string';
    }

    isPointer(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'pointer';
    }

    isStruct(vartype: Vartype): boolean {
        return this.get(vartype).kind === 'struct';
    }

    /** Values that are object references: pointers and null */
    isManagedValue(vartype: Vartype): boolean {
        const kind = this.get(vartype).kind;
        return kind === 'pointer' || kind === 'null';
    }

    hasStructQualifier(vartype: Vartype, qualifier: TypeQualifier): boolean {
        const type = this.get(vartype);
        return type.kind === 'struct' && type.qualifiers.has(qualifier);
    }

    /** Pointer to the internal string struct */
    isStringPointer(vartype: Vartype): boolean {
        const type = this.get(vartype);
        return type.kind === 'pointer' && this.hasStructQualifier(type.target, 'stringstruct');
    }

    pointerTarget(vartype: Vartype): Vartype {
        const type = this.get(vartype);
        if (type.kind !== 'pointer') {
            throw new InternalError(`Vartype '${type.name}' is not a pointer`);
        }
        return type.target;
    }

    /**
     * Type name as written in source. Pointers to autoptr structs print as
     * the struct name.
     */
    describe(vartype: Vartype): string {
        const type = this.get(vartype);
        if (type.kind === 'pointer') {
            const target = this.struct(type.target);
            return target.qualifiers.has('autoptr') ? target.name : `${target.name}*`;
        }
        return type.name;
    }
}
