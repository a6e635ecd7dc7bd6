/**
 * gscript Symbol Table
 *
 * SPDX-License-Identifier: MIT
 *
 * One mutable namespace per compilation unit. Every distinct identifier,
 * literal text and operator maps to exactly one symbol id. A local
 * declaration temporarily replaces the outer meaning of its name; leaving
 * the scope restores it.
 */

import { SymbolType, ScopeType, describeSymbolType } from './types.ts';
import type { Symbol, Vartype, CodeLoc, SymbolTypeValue, ScopeTypeValue } from './types.ts';
import { TypeQualifierSet, SymbolFlagSet } from './flags.ts';
import type { SymbolFlag } from './flags.ts';
import { UserError, InternalError } from './errors.ts';
import {
    END_OF_INPUT,
    KEYWORDS,
    QUALIFIER_KEYWORDS,
    IMPORT_KEYWORDS,
    OPERATOR_SYMBOLS,
    WORD_OPERATORS,
} from './vocabulary.ts';

// ============================================================================
// Symbol Table Types
// ============================================================================

/**
 * A function parameter.
 */
export interface ParamInfo {
    /** null for unnamed parameters of prototypes and imports */
    name: Symbol | null;
    vartype: Vartype;
    isConst: boolean;
    /** Default argument as a raw cell value, null when required */
    defaultValue: number | null;
}

/**
 * A call site whose LITTOREG operand waits for the callee's code location.
 */
export interface PendingCall {
    loc: CodeLoc;
    section: string;
    line: number;
}

/**
 * Function-specific part of a symbol entry.
 */
export interface FunctionInfo {
    params: ParamInfo[];
    returnType: Vartype;
    /** First cell of the body; -1 until the body is placed */
    codeLoc: CodeLoc;
    pendingCalls: PendingCall[];
    /** Index into the import table, -1 for functions defined in the unit */
    importIndex: number;
    /** Owning struct of a member function */
    ownerStruct: Vartype | null;
}

/**
 * Everything known about one symbol.
 */
export interface SymbolEntry {
    readonly id: Symbol;
    readonly name: string;
    type: SymbolTypeValue;
    qualifiers: TypeQualifierSet;
    flags: SymbolFlagSet;
    scope: ScopeTypeValue;
    /** Variable type, constant type or function return type */
    vartype: Vartype;
    /**
     * Location whose meaning depends on `scope`: GlobalLoc, frame position,
     * StringsLoc or import index. Member offset for struct components.
     */
    offset: number;
    /** Nesting depth of the declaration; 0 is the unit level */
    scopeLevel: number;
    /** Value of constants and numeric literals */
    value: number;
    fn: FunctionInfo | null;
    section: string;
    line: number;
}

/**
 * A request to give a symbol a meaning.
 */
export interface Declaration {
    type: SymbolTypeValue;
    scope: ScopeTypeValue;
    vartype: Vartype;
    qualifiers?: TypeQualifierSet;
    offset?: number;
    value?: number;
    fn?: FunctionInfo | null;
    section: string;
    line: number;
}

/**
 * How a declaration relates to the current meaning of its name.
 */
export type Redeclaration =
    /** The name had no meaning yet */
    | 'fresh'
    /** A local hides an outer variable until its scope closes */
    | 'shadow'
    /** An import repeats an earlier import or definition */
    | 'confirm'
    /** The unit defines something that was imported so far */
    | 'define-import'
    /** A function body follows an earlier prototype */
    | 'define-prototype'
    /** An import takes the place of an earlier prototype without a body */
    | 'import-prototype'
    | 'conflict';

const FLAGS_KEPT_ON_REDECLARATION: SymbolFlag[] = ['accessed', 'exported', 'noloopcheck'];

// ============================================================================
// Symbol Table
// ============================================================================

export class SymbolTable {
    private entries: SymbolEntry[] = [];
    private byName = new Map<string, Symbol>();
    /** Per open local scope: the entries hidden by its declarations */
    private hidden: SymbolEntry[][] = [];
    /** Per open local scope: the locals declared in it */
    private scopes: Symbol[][] = [];

    readonly endOfInput: Symbol;

    constructor() {
        this.endOfInput = this.add(END_OF_INPUT, SymbolType.Delimiter);
        for (const keyword of KEYWORDS) {
            this.add(keyword, SymbolType.Keyword);
        }
        for (const keyword of Object.keys(QUALIFIER_KEYWORDS)) {
            const isImport = IMPORT_KEYWORDS.some(k => k === keyword);
            this.add(keyword, isImport ? SymbolType.Import : SymbolType.Keyword);
        }
        for (const [text, type] of OPERATOR_SYMBOLS) {
            this.add(text, type);
        }
        for (const word of WORD_OPERATORS) {
            this.add(word, SymbolType.Operator);
        }
        const self = this.add('this', SymbolType.LocalVar);
        this.get(self).scope = ScopeType.Local;
    }

    /** Current nesting depth: 0 outside of functions */
    get level(): number {
        return this.scopes.length;
    }

    get size(): number {
        return this.entries.length;
    }

    // ========================================================================
    // Lookup
    // ========================================================================

    /**
     * Create a symbol for a name that has none yet.
     */
    add(name: string, type: SymbolTypeValue = SymbolType.NoType): Symbol {
        if (this.byName.has(name)) {
            throw new InternalError(`Symbol '${name}' registered twice`);
        }
        const id = this.entries.length;
        this.entries.push(createEntry(id, name, type));
        this.byName.set(name, id);
        return id;
    }

    /**
     * Innermost meaning of `name`, if it has one.
     */
    find(name: string): Symbol | undefined {
        return this.byName.get(name);
    }

    findOrAdd(name: string): Symbol {
        return this.byName.get(name) ?? this.add(name);
    }

    get(symbol: Symbol): SymbolEntry {
        const entry = this.entries[symbol];
        if (entry === undefined) {
            throw new InternalError(`Unknown symbol id ${symbol}`);
        }
        return entry;
    }

    name(symbol: Symbol): string {
        return this.get(symbol).name;
    }

    typeOf(symbol: Symbol): SymbolTypeValue {
        return this.get(symbol).type;
    }

    /**
     * All entries currently visible, in id order.
     */
    all(): readonly SymbolEntry[] {
        return this.entries;
    }

    // ========================================================================
    // Flags
    // ========================================================================

    setFlag(symbol: Symbol, flag: SymbolFlag): void {
        this.get(symbol).flags.add(flag);
    }

    hasFlag(symbol: Symbol, flag: SymbolFlag): boolean {
        return this.get(symbol).flags.has(flag);
    }

    markAccessed(symbol: Symbol): void {
        this.setFlag(symbol, 'accessed');
    }

    // ========================================================================
    // Declarations
    // ========================================================================

    /**
     * Decide how declaring `symbol` as `type` relates to its current meaning.
     */
    classify(symbol: Symbol, type: SymbolTypeValue, scope: ScopeTypeValue, isImport: boolean): Redeclaration {
        const entry = this.get(symbol);

        if (entry.type === SymbolType.NoType || entry.type === SymbolType.StructComponent) {
            return 'fresh';
        }

        if (scope === ScopeType.Local) {
            if (entry.type === SymbolType.LocalVar && entry.scopeLevel === this.level) {
                return 'conflict';
            }
            return entry.type === SymbolType.GlobalVar || entry.type === SymbolType.LocalVar
                ? 'shadow'
                : 'conflict';
        }

        if (entry.type !== type) {
            return 'conflict';
        }
        if (isImport) {
            const isPrototype = type === SymbolType.Function && !entry.qualifiers.isImport()
                && entry.fn !== null && entry.fn.codeLoc < 0;
            return isPrototype ? 'import-prototype' : 'confirm';
        }
        if (entry.qualifiers.isImport()) {
            return 'define-import';
        }
        if (type === SymbolType.Function && entry.fn !== null && entry.fn.codeLoc < 0) {
            return 'define-prototype';
        }
        return 'conflict';
    }

    /**
     * Give `symbol` a meaning. Throws a UserError for an incompatible
     * redeclaration; signature checks are up to the caller.
     */
    declare(symbol: Symbol, declaration: Declaration): SymbolEntry {
        const entry = this.get(symbol);
        const isImport = declaration.qualifiers?.isImport() ?? false;
        const kind = this.classify(symbol, declaration.type, declaration.scope, isImport);

        switch (kind) {
            case 'conflict':
                throw new UserError(this.conflictMessage(entry, declaration));
            case 'confirm':
                return entry;
            case 'shadow':
                this.hide(entry);
                break;
            case 'fresh':
                if (declaration.scope === ScopeType.Local) {
                    this.hide(entry);
                }
                break;
            case 'define-import':
            case 'define-prototype':
            case 'import-prototype':
                break;
        }

        const next = createEntry(entry.id, entry.name, declaration.type);
        next.scope = declaration.scope;
        next.vartype = declaration.vartype;
        next.qualifiers = declaration.qualifiers?.clone() ?? new TypeQualifierSet();
        next.offset = declaration.offset ?? 0;
        next.value = declaration.value ?? 0;
        next.fn = declaration.fn ?? null;
        next.scopeLevel = declaration.scope === ScopeType.Local ? this.level : 0;
        next.section = declaration.section;
        next.line = declaration.line;

        if (kind === 'define-import' || kind === 'define-prototype' || kind === 'import-prototype') {
            for (const flag of FLAGS_KEPT_ON_REDECLARATION) {
                if (entry.flags.has(flag)) next.flags.add(flag);
            }
        }
        if (kind === 'define-import') {
            // Other units link against the name they imported
            next.flags.add('exported', 'accessed');
        }

        this.entries[entry.id] = next;
        if (declaration.scope === ScopeType.Local) {
            this.currentScope().push(entry.id);
        }
        return next;
    }

    /**
     * Refine a symbol's classification in place, e.g. a forward-declared
     * struct becoming a vartype.
     */
    refine(symbol: Symbol, type: SymbolTypeValue): void {
        const entry = this.get(symbol);
        if (!isRefinement(entry.type, type)) {
            throw new InternalError(
                `Cannot reclassify '${entry.name}' from ${describeSymbolType(entry.type)} to ${describeSymbolType(type)}`,
            );
        }
        entry.type = type;
    }

    private conflictMessage(entry: SymbolEntry, declaration: Declaration): string {
        if (declaration.scope === ScopeType.Local) {
            if (entry.type === SymbolType.LocalVar) {
                return `'${entry.name}' is already declared in this scope`;
            }
            return `'${entry.name}' is ${describeSymbolType(entry.type)} and cannot be redeclared as a local variable`;
        }
        return `'${entry.name}' is already declared as ${describeSymbolType(entry.type)}`;
    }

    // ========================================================================
    // Scopes
    // ========================================================================

    enterScope(): void {
        this.scopes.push([]);
        this.hidden.push([]);
    }

    /**
     * Close the innermost scope. Returns the locals it declared, as they
     * were while in scope, and restores the names they hid.
     */
    exitScope(): SymbolEntry[] {
        const declared = this.scopes.pop();
        const hidden = this.hidden.pop();
        if (declared === undefined || hidden === undefined) {
            throw new InternalError('Scope stack underflow');
        }
        const locals = declared.map(id => this.get(id));
        for (let i = hidden.length - 1; i >= 0; i--) {
            const saved = hidden[i];
            this.entries[saved.id] = saved;
        }
        return locals;
    }

    private currentScope(): Symbol[] {
        const scope = this.scopes[this.scopes.length - 1];
        if (scope === undefined) {
            throw new InternalError('Local declaration outside of a scope');
        }
        return scope;
    }

    private hide(entry: SymbolEntry): void {
        const hidden = this.hidden[this.hidden.length - 1];
        if (hidden === undefined) {
            throw new InternalError(`Local declaration of '${entry.name}' outside of a scope`);
        }
        hidden.push(entry);
    }
}

// ============================================================================
// Helpers
// ============================================================================

function createEntry(id: Symbol, name: string, type: SymbolTypeValue): SymbolEntry {
    return {
        id,
        name,
        type,
        qualifiers: new TypeQualifierSet(),
        flags: new SymbolFlagSet(),
        scope: ScopeType.None,
        vartype: 0,
        offset: 0,
        scopeLevel: 0,
        value: 0,
        fn: null,
        section: '',
        line: 0,
    };
}

/**
 * Allowed forward refinements of a classification.
 */
export function isRefinement(from: SymbolTypeValue, to: SymbolTypeValue): boolean {
    if (from === to || from === SymbolType.NoType) return true;
    if (from === SymbolType.UndefinedStruct) return to === SymbolType.Vartype;
    if (from === SymbolType.StructComponent) {
        return to === SymbolType.GlobalVar
            || to === SymbolType.LocalVar
            || to === SymbolType.Function
            || to === SymbolType.Constant;
    }
    return false;
}
