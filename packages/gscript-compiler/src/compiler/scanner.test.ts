import { describe, it, expect } from 'vitest';
import { scan } from './scanner.ts';
import { SymbolTable } from './symbol-table.ts';
import { TypeRegistry, BuiltinType } from './type-registry.ts';
import { StringRepository } from './segments.ts';
import { SymbolType, ScopeType } from './types.ts';
import { UserError } from './errors.ts';

function setup(): { symbols: SymbolTable; strings: StringRepository } {
    const symbols = new SymbolTable();
    new TypeRegistry(symbols);
    return { symbols, strings: new StringRepository() };
}

describe('scan', () => {
    it('should produce resolved symbols ending with end-of-input', () => {
        const { symbols, strings } = setup();
        const result = scan('int x = 5;', symbols, strings);
        const names = result.map(s => symbols.name(s.symbol));

        expect(names).toEqual(['int', 'x', '=', '5', ';', '<end of input>']);
        expect(result[result.length - 1]?.symbol).toBe(symbols.endOfInput);
        expect(symbols.typeOf(symbols.findOrAdd('x'))).toBe(SymbolType.NoType);
        expect(symbols.get(symbols.findOrAdd('5')).value).toBe(5);
    });

    it('should match operators greedily', () => {
        const { symbols, strings } = setup();
        const names = scan('a <<= b != c++;', symbols, strings).map(s => symbols.name(s.symbol));
        expect(names).toEqual(['a', '<<=', 'b', '!=', 'c', '++', ';', '<end of input>']);
    });

    it('should track lines across comments', () => {
        const { symbols, strings } = setup();
        const result = scan('a // one\n/* two\n three */ b\nc', symbols, strings);
        expect(result.map(s => s.line)).toEqual([1, 3, 4, 4]);
    });

    it('should classify numeric literals', () => {
        const { symbols, strings } = setup();
        scan('12 0x1F 2.5 1e3 \'A\'', symbols, strings);

        expect(symbols.get(symbols.findOrAdd('0x1F')).value).toBe(31);
        const float = symbols.get(symbols.findOrAdd('2.5'));
        expect(float.type).toBe(SymbolType.LiteralFloat);
        expect(float.vartype).toBe(BuiltinType.Float);
        expect(symbols.get(symbols.findOrAdd('1e3')).value).toBe(1000);
        expect(symbols.get(symbols.findOrAdd("'A'")).value).toBe(65);
    });

    it('should store identical string literals once', () => {
        const { symbols, strings } = setup();
        const result = scan('"hi" "hi" "ho"', symbols, strings);

        expect(result[0]?.symbol).toBe(result[1]?.symbol);
        const hi = symbols.get(symbols.findOrAdd('"hi"'));
        expect(hi.type).toBe(SymbolType.LiteralString);
        expect(hi.scope).toBe(ScopeType.Strings);
        expect(hi.offset).toBe(0);
        expect(symbols.get(symbols.findOrAdd('"ho"')).offset).toBe(3);
        expect(strings.count).toBe(2);
        expect(Array.from(strings.toBytes())).toEqual([104, 105, 0, 104, 111, 0]);
    });

    it('should decode escapes', () => {
        const { symbols, strings } = setup();
        scan('"a\\n\\"b"', symbols, strings);
        expect(Array.from(strings.toBytes())).toEqual([97, 10, 34, 98, 0]);
    });

    it('should switch sections at section markers', () => {
        const { symbols, strings } = setup();
        const result = scan('a\n"__NEWSCRIPTSTART_room1"\nb\nc', symbols, strings, 'header');

        expect(result.map(s => [symbols.name(s.symbol), s.section, s.line])).toEqual([
            ['a', 'header', 1],
            ['b', 'room1', 1],
            ['c', 'room1', 2],
            ['<end of input>', 'room1', 2],
        ]);
        expect(strings.count).toBe(0);
    });

    it('should accept one past INT_MAX only after a minus', () => {
        const { symbols, strings } = setup();
        const names = scan('x = -2147483648;', symbols, strings).map(s => symbols.name(s.symbol));

        expect(names).toEqual(['x', '=', '-', '2147483648', ';', '<end of input>']);
        expect(symbols.get(symbols.findOrAdd('2147483648')).value).toBe(-2147483648);
        expect(() => scan('x = 2147483648;', setup().symbols, strings))
            .toThrow("Integer literal '2147483648' is out of range");
    });

    it('should reject malformed input with a positioned user error', () => {
        const { symbols, strings } = setup();
        expect(() => scan('int a;\n"open', symbols, strings)).toThrow(UserError);
        expect(() => scan('x = 12ab;', symbols, strings)).toThrow("Malformed number literal '12ab'");
        expect(() => scan('x = 99999999999;', symbols, strings)).toThrow("Integer literal '99999999999' is out of range");
        expect(() => scan('x @ y', symbols, strings)).toThrow("Unexpected character '@'");

        try {
            scan('\n\n/* never closed', symbols, strings);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(UserError);
            if (error instanceof UserError) {
                expect(error.line).toBe(3);
                expect(error.detail).toBe('Unterminated block comment');
            }
        }
    });
});
