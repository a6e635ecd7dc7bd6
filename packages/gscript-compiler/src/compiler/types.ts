/**
 * gscript Shared Definitions
 *
 * SPDX-License-Identifier: MIT
 *
 * Identifier aliases, symbol classifications, storage classes and the
 * binary layout constants shared by every compiler stage.
 */

// ============================================================================
// Identifier Aliases
// ============================================================================

/** A classified name, literal or operator slot (result of scanning) */
export type Symbol = number;
/** An id into the type registry, e.g. "int" */
export type Vartype = number;
/** A bytecode cell: an opcode or one of its operands */
export type CodeCell = number;
/** An index into the code cells; negative while not yet placed */
export type CodeLoc = number;
/** A byte offset into the string repository */
export type StringsLoc = number;
/** A byte offset into the global data segment */
export type GlobalLoc = number;

// ============================================================================
// Binary Layout Constants
// ============================================================================

/**
 * Sizes the runtime relies on. The VM that loads a module is a fixed
 * contract, so these must not change.
 */
export const Sizes = {
    CHAR: 1,
    SHORT: 2,
    INT: 4,
    LONG: 4,
    FLOAT: 4,
    DYNPOINTER: 4,
    STACK_CELL: 4,
    STRUCT_ALIGN: 4,
} as const;

export const MAX_FUNCTION_PARAMETERS = 15;

/**
 * Round a size up to the next multiple of `alignment`.
 */
export function alignTo(size: number, alignment: number): number {
    return Math.ceil(size / alignment) * alignment;
}

// ============================================================================
// Symbol Classification
// ============================================================================

/**
 * What a symbol denotes. The numeric order matters: every type before
 * `StructComponent` may occur as part of an expression.
 */
export const SymbolType = {
    NoType: 0,
    Attribute: 1,
    Delimiter: 2,
    Constant: 3,
    Function: 4,
    GlobalVar: 5,
    LiteralFloat: 6,
    LiteralInt: 7,
    LiteralString: 8,
    LocalVar: 9,
    Operator: 10,
    StructComponent: 11,
    Assign: 12,
    AssignMod: 13,
    AssignSOp: 14,
    Keyword: 15,
    Import: 16,
    UndefinedStruct: 17,
    Vartype: 18,
} as const;

export type SymbolTypeValue = typeof SymbolType[keyof typeof SymbolType];

/** Symbol types from here on can't be part of expressions */
export const LAST_IN_EXPRESSION: SymbolTypeValue = SymbolType.StructComponent;

export function isExpressionSymbolType(type: SymbolTypeValue): boolean {
    return type < LAST_IN_EXPRESSION;
}

const SYMBOL_TYPE_NAMES: Record<SymbolTypeValue, string> = {
    [SymbolType.NoType]: 'an undeclared identifier',
    [SymbolType.Attribute]: 'an attribute',
    [SymbolType.Delimiter]: 'a delimiter',
    [SymbolType.Constant]: 'a constant',
    [SymbolType.Function]: 'a function',
    [SymbolType.GlobalVar]: 'a global variable',
    [SymbolType.LiteralFloat]: 'a float literal',
    [SymbolType.LiteralInt]: 'an integer literal',
    [SymbolType.LiteralString]: 'a string literal',
    [SymbolType.LocalVar]: 'a local variable',
    [SymbolType.Operator]: 'an operator',
    [SymbolType.StructComponent]: 'a struct component',
    [SymbolType.Assign]: 'an assignment',
    [SymbolType.AssignMod]: 'a modifying assignment',
    [SymbolType.AssignSOp]: 'a single-operand assignment',
    [SymbolType.Keyword]: 'a keyword',
    [SymbolType.Import]: 'an import keyword',
    [SymbolType.UndefinedStruct]: 'a forward-declared struct',
    [SymbolType.Vartype]: 'a type name',
};

/**
 * Human readable classification, used in diagnostics.
 */
export function describeSymbolType(type: SymbolTypeValue): string {
    return SYMBOL_TYPE_NAMES[type];
}

// ============================================================================
// Storage Classes
// ============================================================================

/**
 * Where a variable's storage lives.
 */
export const ScopeType = {
    None: 0,
    Global: 1,
    Import: 2,
    Local: 3,
    Strings: 4,
} as const;

export type ScopeTypeValue = typeof ScopeType[keyof typeof ScopeType];
