/**
 * gscript Expression Trees
 *
 * SPDX-License-Identifier: MIT
 *
 * Transient trees for one expression or simple statement. The parser
 * builds a tree, the expression emitter checks and emits it, and the tree
 * is dropped; nothing outlives the statement it belongs to.
 */

import type { Symbol, Vartype } from './types.ts';

// ============================================================================
// Base Node Types
// ============================================================================

export interface ASTNode {
    kind: string;
    line: number;
    section: string;
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * A name or literal: variable, constant, function, literal, `this`.
 */
export interface NameExpr extends ASTNode {
    kind: 'Name';
    symbol: Symbol;
}

/**
 * Member access `object.member`. For static access on a type name
 * (`Struct.member`) `object` is null.
 */
export interface MemberExpr extends ASTNode {
    kind: 'Member';
    object: Expression | null;
    /** The struct named on the left of a static access */
    staticType: Vartype | null;
    member: string;
}

export interface CallExpr extends ASTNode {
    kind: 'Call';
    callee: Expression;
    args: Expression[];
}

export type UnaryOperator = '-' | '!';

export interface UnaryExpr extends ASTNode {
    kind: 'Unary';
    operator: UnaryOperator;
    operand: Expression;
}

export type BinaryOperator =
    | '||' | '&&'
    | '==' | '!='
    | '<' | '>' | '<=' | '>='
    | '|' | '^' | '&'
    | '<<' | '>>'
    | '+' | '-'
    | '*' | '/' | '%';

export interface BinaryExpr extends ASTNode {
    kind: 'Binary';
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
}

export interface TernaryExpr extends ASTNode {
    kind: 'Ternary';
    condition: Expression;
    whenTrue: Expression;
    whenFalse: Expression;
}

/**
 * `new Struct`
 */
export interface NewExpr extends ASTNode {
    kind: 'New';
    vartype: Vartype;
}

export type Expression =
    | NameExpr
    | MemberExpr
    | CallExpr
    | UnaryExpr
    | BinaryExpr
    | TernaryExpr
    | NewExpr;

// ============================================================================
// Simple Statements
// ============================================================================

/**
 * Operator of an arithmetic modifying assignment, without the `=`.
 */
export type ModifyOperator = '+' | '-' | '*' | '/' | '%' | '&' | '|' | '^' | '<<' | '>>';

/**
 * `target = value` or `target op= value`.
 */
export interface AssignStatement extends ASTNode {
    kind: 'Assign';
    /** null for plain assignment */
    operator: ModifyOperator | null;
    target: Expression;
    value: Expression;
}

/**
 * `++target`, `target--`, ...
 */
export interface IncDecStatement extends ASTNode {
    kind: 'IncDec';
    operator: '++' | '--';
    target: Expression;
}

export interface CallStatement extends ASTNode {
    kind: 'CallStatement';
    call: CallExpr;
}

export type SimpleStatement = AssignStatement | IncDecStatement | CallStatement;

const BINARY_OPERATORS: ReadonlySet<string> = new Set<BinaryOperator>([
    '||', '&&', '==', '!=', '<', '>', '<=', '>=', '|', '^', '&', '<<', '>>', '+', '-', '*', '/', '%',
]);

export function isBinaryOperator(text: string): text is BinaryOperator {
    return BINARY_OPERATORS.has(text);
}

const MODIFY_OPERATORS: ReadonlySet<string> = new Set<ModifyOperator>([
    '+', '-', '*', '/', '%', '&', '|', '^', '<<', '>>',
]);

export function isModifyOperator(text: string): text is ModifyOperator {
    return MODIFY_OPERATORS.has(text);
}
