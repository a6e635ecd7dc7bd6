import { describe, it, expect } from 'vitest';
import { SymbolTable } from './symbol-table.ts';
import { TypeRegistry, BuiltinType } from './type-registry.ts';
import type { StructMember } from './type-registry.ts';
import { SymbolType } from './types.ts';
import { TypeQualifierSet } from './flags.ts';
import { UserError } from './errors.ts';

function setup(): { symbols: SymbolTable; types: TypeRegistry } {
    const symbols = new SymbolTable();
    return { symbols, types: new TypeRegistry(symbols) };
}

describe('TypeRegistry', () => {
    it('should register the built-in types with fixed ids and sizes', () => {
        const { symbols, types } = setup();

        expect(types.sizeOf(BuiltinType.Void)).toBe(0);
        expect(types.sizeOf(BuiltinType.Char)).toBe(1);
        expect(types.sizeOf(BuiltinType.Short)).toBe(2);
        expect(types.sizeOf(BuiltinType.Int)).toBe(4);
        expect(types.sizeOf(BuiltinType.Long)).toBe(4);
        expect(types.sizeOf(BuiltinType.Float)).toBe(4);
        expect(types.sizeOf(BuiltinType.Bool)).toBe(4);
        expect(symbols.get(symbols.findOrAdd('int')).vartype).toBe(BuiltinType.Int);

        const trueEntry = symbols.get(symbols.findOrAdd('true'));
        expect(trueEntry.type).toBe(SymbolType.Constant);
        expect(trueEntry.vartype).toBe(BuiltinType.Bool);
        expect(trueEntry.value).toBe(1);
    });

    it('should pre-register String as an incomplete internal string struct', () => {
        const { types } = setup();
        const stringStruct = types.struct(BuiltinType.StringStruct);

        expect(stringStruct.name).toBe('String');
        expect(stringStruct.qualifiers.values()).toEqual(['autoptr', 'builtin', 'managed', 'stringstruct']);
        expect(types.isComplete(BuiltinType.StringStruct)).toBe(false);
        expect(types.stringStruct()).toBe(BuiltinType.StringStruct);
        expect(types.isStringPointer(types.pointerTo(BuiltinType.StringStruct))).toBe(true);
    });

    it('should declare a struct incomplete and complete it once', () => {
        const { symbols, types } = setup();
        const symbol = symbols.findOrAdd('Point');
        const point = types.declareStruct(symbol, new TypeQualifierSet());

        expect(symbols.typeOf(symbol)).toBe(SymbolType.UndefinedStruct);
        expect(types.declareStruct(symbol, new TypeQualifierSet())).toBe(point);
        expect(() => types.sizeOf(point, 'Declaring \'p\''))
            .toThrow("Declaring 'p' requires a complete type, but struct 'Point' is incomplete");

        const member: StructMember = {
            name: 'x',
            symbol: symbols.findOrAdd('Point::x'),
            kind: 'field',
            vartype: BuiltinType.Int,
            offset: 0,
            qualifiers: new TypeQualifierSet(),
        };
        types.completeStruct(point, [member], 4);

        expect(symbols.typeOf(symbol)).toBe(SymbolType.Vartype);
        expect(types.sizeOf(point)).toBe(4);
        expect(types.findMember(point, 'x', 'Accessing')?.offset).toBe(0);
        expect(types.findMember(point, 'y', 'Accessing')).toBeUndefined();
    });

    it('should require matching qualifiers on a repeated declaration', () => {
        const { symbols, types } = setup();
        const symbol = symbols.findOrAdd('Thing');
        types.declareStruct(symbol, TypeQualifierSet.of('managed'));

        expect(() => types.declareStruct(symbol, new TypeQualifierSet()))
            .toThrow("Struct 'Thing' was declared before with different qualifiers ('managed')");
    });

    it('should reject a second internal string struct', () => {
        const { symbols, types } = setup();
        expect(() => types.declareStruct(symbols.findOrAdd('Text'), TypeQualifierSet.of('managed', 'stringstruct')))
            .toThrow(UserError);
    });

    it('should intern pointers to managed structs only', () => {
        const { symbols, types } = setup();
        const managed = types.declareStruct(symbols.findOrAdd('Node'), TypeQualifierSet.of('managed'));
        const plain = types.declareStruct(symbols.findOrAdd('Pair'), new TypeQualifierSet());

        const pointer = types.pointerTo(managed);
        expect(types.pointerTo(managed)).toBe(pointer);
        expect(types.sizeOf(pointer)).toBe(4);
        expect(types.describe(pointer)).toBe('Node*');
        expect(types.pointerTarget(pointer)).toBe(managed);
        expect(() => types.pointerTo(plain)).toThrow("Cannot point to 'Pair': only managed structs can be pointed to");
    });

    it('should describe autoptr pointers by the struct name', () => {
        const { types } = setup();
        expect(types.describe(types.pointerTo(BuiltinType.StringStruct))).toBe('String');
    });

    it('should register enums as integer types', () => {
        const { symbols, types } = setup();
        const color = types.declareEnum(symbols.findOrAdd('Color'));

        expect(types.isInteger(color)).toBe(true);
        expect(types.sizeOf(color)).toBe(4);
        expect(() => types.declareEnum(symbols.findOrAdd('Color'))).toThrow("'Color' is already declared as a type name");
    });
});
