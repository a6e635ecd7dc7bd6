/**
 * gscript Scanner
 *
 * SPDX-License-Identifier: MIT
 *
 * Turns source text into a sequence of symbols that are already resolved
 * against the symbol table. Literals are interned by text; string literals
 * are added to the string repository on first sight.
 */

import { SymbolType, ScopeType } from './types.ts';
import type { Symbol } from './types.ts';
import { UserError } from './errors.ts';
import { OPERATOR_SYMBOLS, NEW_SECTION_MARKER } from './vocabulary.ts';
import { BuiltinType } from './type-registry.ts';
import type { SymbolTable } from './symbol-table.ts';
import type { StringRepository } from './segments.ts';

/**
 * A symbol occurrence with its source position.
 */
export interface ScannedSymbol {
    symbol: Symbol;
    line: number;
    section: string;
}

const OPERATOR_TEXTS = new Set(OPERATOR_SYMBOLS.map(([text]) => text));
const LONGEST_OPERATOR = Math.max(...OPERATOR_SYMBOLS.map(([text]) => text.length));

const INT_MAX = 2147483647;
const UINT_MAX = 4294967295;

const ESCAPES: Record<string, string> = {
    '\\': '\\',
    '"': '"',
    "'": "'",
    n: '\n',
    r: '\r',
    t: '\t',
    '0': '\0',
};

/**
 * Scan `source`. The result always ends with the end-of-input symbol.
 *
 * @throws UserError on malformed literals, unterminated strings or comments,
 *   and characters that start no token
 */
export function scan(
    source: string,
    symbols: SymbolTable,
    strings: StringRepository,
    sectionName = 'main',
): ScannedSymbol[] {
    const result: ScannedSymbol[] = [];
    let pos = 0;
    let line = 1;
    let section = sectionName;

    const current = (): string => source[pos] ?? '\0';
    const peek = (offset = 1): string => source[pos + offset] ?? '\0';
    const isAtEnd = (): boolean => pos >= source.length;

    function fail(message: string, atLine = line): never {
        throw new UserError(message, section, atLine);
    }

    const advance = (): string => {
        const ch = current();
        pos++;
        if (ch === '\n') line++;
        return ch;
    };

    const emit = (symbol: Symbol, atLine: number): void => {
        result.push({ symbol, line: atLine, section });
    };

    const skipWhitespace = (): void => {
        while (!isAtEnd()) {
            const ch = current();
            if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
                advance();
            } else if (ch === '/' && peek() === '/') {
                while (!isAtEnd() && current() !== '\n') {
                    advance();
                }
            } else if (ch === '/' && peek() === '*') {
                const startLine = line;
                advance();
                advance();
                while (!(current() === '*' && peek() === '/')) {
                    if (isAtEnd()) fail('Unterminated block comment', startLine);
                    advance();
                }
                advance();
                advance();
            } else {
                break;
            }
        }
    };

    const readIdentifier = (): string => {
        let text = '';
        while (!isAtEnd() && isIdentifierChar(current())) {
            text += advance();
        }
        return text;
    };

    /**
     * Read an escape sequence after its backslash.
     */
    const readEscape = (): string => {
        const ch = advance();
        if (ch === '[') return '\\[';
        const replacement = ESCAPES[ch];
        if (replacement === undefined) {
            fail(`Unknown escape sequence '\\${ch}'`);
        }
        return replacement;
    };

    const readNumber = (startLine: number): void => {
        let text = '';

        if (current() === '0' && (peek() === 'x' || peek() === 'X')) {
            text += advance();
            text += advance();
            while (!isAtEnd() && isHexDigit(current())) {
                text += advance();
            }
            if (isIdentifierChar(current())) fail(`Malformed number literal '${text + readIdentifier()}'`);
            if (text.length === 2) fail(`Malformed hexadecimal literal '${text}'`);

            const value = Number.parseInt(text.slice(2), 16);
            if (value > UINT_MAX) fail(`Integer literal '${text}' is out of range`);
            emit(internLiteral(symbols, text, SymbolType.LiteralInt, value | 0), startLine);
            return;
        }

        let isFloat = false;
        while (!isAtEnd() && isDigit(current())) {
            text += advance();
        }
        if (current() === '.' && !isIdentifierStart(peek())) {
            isFloat = true;
            text += advance();
            while (!isAtEnd() && isDigit(current())) {
                text += advance();
            }
        }
        if ((current() === 'e' || current() === 'E')
            && (isDigit(peek()) || ((peek() === '+' || peek() === '-') && isDigit(peek(2))))) {
            isFloat = true;
            text += advance();
            if (current() === '+' || current() === '-') text += advance();
            while (!isAtEnd() && isDigit(current())) {
                text += advance();
            }
        }
        if (isIdentifierChar(current())) {
            fail(`Malformed number literal '${text + readIdentifier()}'`);
        }

        if (isFloat) {
            const value = Number.parseFloat(text);
            if (!Number.isFinite(value)) fail(`Float literal '${text}' is out of range`);
            emit(internLiteral(symbols, text, SymbolType.LiteralFloat, value), startLine);
            return;
        }
        const value = Number.parseInt(text, 10);
        // -2147483648 scans as '-' and a literal one past INT_MAX
        const last = result[result.length - 1];
        const afterMinus = last !== undefined && symbols.name(last.symbol) === '-';
        if (value > (afterMinus ? INT_MAX + 1 : INT_MAX)) fail(`Integer literal '${text}' is out of range`);
        emit(internLiteral(symbols, text, SymbolType.LiteralInt, value | 0), startLine);
    };

    const readString = (startLine: number): void => {
        advance(); // opening quote
        let value = '';
        while (current() !== '"') {
            if (isAtEnd() || current() === '\n') fail('Unterminated string literal', startLine);
            if (current() === '\\') {
                advance();
                value += readEscape();
            } else {
                value += advance();
            }
        }
        advance(); // closing quote

        if (value.startsWith(NEW_SECTION_MARKER)) {
            section = value.slice(NEW_SECTION_MARKER.length);
            line = 0;
            return;
        }

        const name = `"${value}"`;
        let symbol = symbols.find(name);
        if (symbol === undefined) {
            symbol = symbols.add(name, SymbolType.LiteralString);
            const entry = symbols.get(symbol);
            entry.vartype = BuiltinType.String;
            entry.scope = ScopeType.Strings;
            entry.offset = strings.add(value);
        }
        emit(symbol, startLine);
    };

    const readChar = (startLine: number): void => {
        const start = pos;
        advance(); // opening quote
        let value = '';
        if (current() === '\\') {
            advance();
            value = readEscape();
        } else if (current() !== "'" && current() !== '\n' && !isAtEnd()) {
            value = advance();
        }
        if (current() !== "'") fail('Unterminated or malformed character literal', startLine);
        advance(); // closing quote
        if (value.length !== 1) fail('A character literal must contain exactly one character', startLine);

        const text = source.slice(start, pos);
        emit(internLiteral(symbols, text, SymbolType.LiteralInt, value.charCodeAt(0)), startLine);
    };

    const readOperator = (startLine: number): void => {
        for (let length = LONGEST_OPERATOR; length > 0; length--) {
            const text = source.slice(pos, pos + length);
            if (text.length === length && OPERATOR_TEXTS.has(text)) {
                pos += length;
                const symbol = symbols.find(text);
                if (symbol === undefined) fail(`Operator '${text}' is not registered`);
                emit(symbol, startLine);
                return;
            }
        }
        fail(`Unexpected character '${current()}'`);
    };

    while (true) {
        skipWhitespace();
        if (isAtEnd()) break;

        const startLine = line;
        const ch = current();

        if (isIdentifierStart(ch)) {
            emit(symbols.findOrAdd(readIdentifier()), startLine);
        } else if (isDigit(ch)) {
            readNumber(startLine);
        } else if (ch === '"') {
            readString(startLine);
        } else if (ch === "'") {
            readChar(startLine);
        } else {
            readOperator(startLine);
        }
    }

    emit(symbols.endOfInput, line);
    return result;
}

/**
 * Symbol for a numeric literal, created on first occurrence of its text.
 */
function internLiteral(
    symbols: SymbolTable,
    text: string,
    type: typeof SymbolType.LiteralInt | typeof SymbolType.LiteralFloat,
    value: number,
): Symbol {
    const known = symbols.find(text);
    if (known !== undefined) return known;

    const symbol = symbols.add(text, type);
    const entry = symbols.get(symbol);
    entry.vartype = type === SymbolType.LiteralFloat ? BuiltinType.Float : BuiltinType.Int;
    entry.value = value;
    return symbol;
}

function isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
    return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isIdentifierStart(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentifierChar(ch: string): boolean {
    return isIdentifierStart(ch) || isDigit(ch);
}
