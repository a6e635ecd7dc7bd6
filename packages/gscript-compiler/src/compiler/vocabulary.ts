/**
 * gscript Vocabulary
 *
 * SPDX-License-Identifier: MIT
 *
 * Reserved words, operators and delimiters. Each entry is registered in
 * the symbol table before scanning starts, so their symbol ids are the
 * same in every compilation unit.
 */

import { SymbolType } from './types.ts';
import type { SymbolTypeValue } from './types.ts';
import type { TypeQualifier } from './flags.ts';

/** Name of the symbol that terminates every scanned sequence */
export const END_OF_INPUT = '<end of input>';

/**
 * Keywords that introduce statements and declarations.
 */
export const KEYWORDS = [
    'break',
    'case',
    'continue',
    'default',
    'do',
    'else',
    'enum',
    'export',
    'for',
    'function',
    'if',
    'noloopcheck',
    'return',
    'struct',
    'switch',
    'while',
] as const;

/**
 * Qualifier keywords and the qualifier each one sets.
 */
export const QUALIFIER_KEYWORDS: Readonly<Record<string, TypeQualifier>> = {
    attribute: 'attribute',
    autoptr: 'autoptr',
    builtin: 'builtin',
    const: 'const',
    import: 'importstd',
    _tryimport: 'importtry',
    internalstring: 'stringstruct',
    managed: 'managed',
    protected: 'protected',
    readonly: 'readonly',
    static: 'static',
    writeprotected: 'writeprotected',
};

/** Qualifier keywords that are classified as import keywords */
export const IMPORT_KEYWORDS = ['import', '_tryimport'] as const;

/**
 * Operator texts, longest first so the scanner can match greedily.
 */
export const OPERATOR_SYMBOLS: ReadonlyArray<readonly [string, SymbolTypeValue]> = [
    ['<<=', SymbolType.AssignMod],
    ['>>=', SymbolType.AssignMod],
    ['::', SymbolType.Delimiter],
    ['==', SymbolType.Operator],
    ['!=', SymbolType.Operator],
    ['<=', SymbolType.Operator],
    ['>=', SymbolType.Operator],
    ['&&', SymbolType.Operator],
    ['||', SymbolType.Operator],
    ['<<', SymbolType.Operator],
    ['>>', SymbolType.Operator],
    ['++', SymbolType.AssignSOp],
    ['--', SymbolType.AssignSOp],
    ['+=', SymbolType.AssignMod],
    ['-=', SymbolType.AssignMod],
    ['*=', SymbolType.AssignMod],
    ['/=', SymbolType.AssignMod],
    ['%=', SymbolType.AssignMod],
    ['&=', SymbolType.AssignMod],
    ['|=', SymbolType.AssignMod],
    ['^=', SymbolType.AssignMod],
    ['+', SymbolType.Operator],
    ['-', SymbolType.Operator],
    ['*', SymbolType.Operator],
    ['/', SymbolType.Operator],
    ['%', SymbolType.Operator],
    ['<', SymbolType.Operator],
    ['>', SymbolType.Operator],
    ['!', SymbolType.Operator],
    ['&', SymbolType.Operator],
    ['|', SymbolType.Operator],
    ['^', SymbolType.Operator],
    ['?', SymbolType.Operator],
    ['=', SymbolType.Assign],
    ['(', SymbolType.Delimiter],
    [')', SymbolType.Delimiter],
    ['{', SymbolType.Delimiter],
    ['}', SymbolType.Delimiter],
    ['[', SymbolType.Delimiter],
    [']', SymbolType.Delimiter],
    [',', SymbolType.Delimiter],
    [';', SymbolType.Delimiter],
    [':', SymbolType.Delimiter],
    ['.', SymbolType.Delimiter],
];

/** Word operators */
export const WORD_OPERATORS = ['new'] as const;

/**
 * Prefix of a string literal that starts a new section; the rest of the
 * literal is the section name.
 */
export const NEW_SECTION_MARKER = '__NEWSCRIPTSTART_';
