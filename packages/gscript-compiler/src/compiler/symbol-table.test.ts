import { describe, it, expect } from 'vitest';
import { SymbolTable, isRefinement } from './symbol-table.ts';
import type { FunctionInfo } from './symbol-table.ts';
import { SymbolType, ScopeType } from './types.ts';
import { TypeQualifierSet } from './flags.ts';
import { UserError, InternalError } from './errors.ts';
import { BuiltinType } from './type-registry.ts';

const at = { section: 'main', line: 1 };

describe('SymbolTable', () => {
    it('should pre-register the vocabulary', () => {
        const symbols = new SymbolTable();

        expect(symbols.endOfInput).toBe(0);
        expect(symbols.typeOf(symbols.findOrAdd('while'))).toBe(SymbolType.Keyword);
        expect(symbols.typeOf(symbols.findOrAdd('import'))).toBe(SymbolType.Import);
        expect(symbols.typeOf(symbols.findOrAdd('_tryimport'))).toBe(SymbolType.Import);
        expect(symbols.typeOf(symbols.findOrAdd('+='))).toBe(SymbolType.AssignMod);
        expect(symbols.typeOf(symbols.findOrAdd('new'))).toBe(SymbolType.Operator);
        expect(symbols.typeOf(symbols.findOrAdd('this'))).toBe(SymbolType.LocalVar);
    });

    it('should give each name exactly one symbol', () => {
        const symbols = new SymbolTable();
        const a = symbols.findOrAdd('score');
        expect(symbols.findOrAdd('score')).toBe(a);
        expect(symbols.name(a)).toBe('score');
        expect(symbols.typeOf(a)).toBe(SymbolType.NoType);
        expect(() => symbols.add('score')).toThrow(InternalError);
    });

    it('should declare a global variable', () => {
        const symbols = new SymbolTable();
        const x = symbols.findOrAdd('x');
        const entry = symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Global,
            vartype: BuiltinType.Int,
            offset: 8,
            ...at,
        });

        expect(entry.type).toBe(SymbolType.GlobalVar);
        expect(entry.offset).toBe(8);
        expect(symbols.get(x)).toBe(entry);
    });

    it('should reject an incompatible redeclaration with a user error', () => {
        const symbols = new SymbolTable();
        const x = symbols.findOrAdd('x');
        symbols.declare(x, { type: SymbolType.GlobalVar, scope: ScopeType.Global, vartype: BuiltinType.Int, ...at });

        expect(() => symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Global,
            vartype: BuiltinType.Int,
            ...at,
        })).toThrow("'x' is already declared as a global variable");
        expect(() => symbols.declare(x, {
            type: SymbolType.Function,
            scope: ScopeType.Global,
            vartype: BuiltinType.Int,
            ...at,
        })).toThrow(UserError);
    });

    it('should let a definition replace an import and keep it public', () => {
        const symbols = new SymbolTable();
        const x = symbols.findOrAdd('x');
        symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Import,
            vartype: BuiltinType.Int,
            qualifiers: TypeQualifierSet.of('importstd'),
            ...at,
        });

        expect(symbols.classify(x, SymbolType.GlobalVar, ScopeType.Global, false)).toBe('define-import');
        const defined = symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Global,
            vartype: BuiltinType.Int,
            ...at,
        });
        expect(defined.scope).toBe(ScopeType.Global);
        expect(defined.flags.has('exported')).toBe(true);
    });

    it('should confirm a repeated import without change', () => {
        const symbols = new SymbolTable();
        const x = symbols.findOrAdd('x');
        const first = symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Import,
            vartype: BuiltinType.Int,
            qualifiers: TypeQualifierSet.of('importstd'),
            offset: 0,
            ...at,
        });
        const second = symbols.declare(x, {
            type: SymbolType.GlobalVar,
            scope: ScopeType.Import,
            vartype: BuiltinType.Int,
            qualifiers: TypeQualifierSet.of('importstd'),
            offset: 3,
            ...at,
        });
        expect(second).toBe(first);
        expect(second.offset).toBe(0);
    });

    it('should let an import take the place of a prototype without a body', () => {
        const symbols = new SymbolTable();
        const g = symbols.findOrAdd('g');
        const info = (importIndex: number): FunctionInfo => ({
            params: [],
            returnType: BuiltinType.Int,
            codeLoc: -1,
            pendingCalls: [],
            importIndex,
            ownerStruct: null,
        });
        symbols.declare(g, { type: SymbolType.Function, scope: ScopeType.Global, vartype: BuiltinType.Int, fn: info(-1), ...at });

        expect(symbols.classify(g, SymbolType.Function, ScopeType.Import, true)).toBe('import-prototype');
        const imported = symbols.declare(g, {
            type: SymbolType.Function,
            scope: ScopeType.Import,
            vartype: BuiltinType.Int,
            qualifiers: TypeQualifierSet.of('importstd'),
            fn: info(0),
            ...at,
        });
        expect(imported.scope).toBe(ScopeType.Import);
        expect(imported.qualifiers.isImport()).toBe(true);
        expect(imported.fn?.importIndex).toBe(0);
        expect(symbols.classify(g, SymbolType.Function, ScopeType.Import, true)).toBe('confirm');
    });

    it('should restore shadowed globals when a scope closes', () => {
        const symbols = new SymbolTable();
        const x = symbols.findOrAdd('x');
        symbols.declare(x, { type: SymbolType.GlobalVar, scope: ScopeType.Global, vartype: BuiltinType.Int, ...at });

        symbols.enterScope();
        symbols.declare(x, { type: SymbolType.LocalVar, scope: ScopeType.Local, vartype: BuiltinType.Float, ...at });
        expect(symbols.typeOf(x)).toBe(SymbolType.LocalVar);
        expect(symbols.level).toBe(1);

        const locals = symbols.exitScope();
        expect(locals.map(e => e.name)).toEqual(['x']);
        expect(symbols.typeOf(x)).toBe(SymbolType.GlobalVar);
        expect(symbols.get(x).vartype).toBe(BuiltinType.Int);
    });

    it('should reject two locals of one name in one scope', () => {
        const symbols = new SymbolTable();
        const y = symbols.findOrAdd('y');
        symbols.enterScope();
        symbols.declare(y, { type: SymbolType.LocalVar, scope: ScopeType.Local, vartype: BuiltinType.Int, ...at });
        expect(() => symbols.declare(y, {
            type: SymbolType.LocalVar,
            scope: ScopeType.Local,
            vartype: BuiltinType.Int,
            ...at,
        })).toThrow("'y' is already declared in this scope");
    });

    it('should return a fresh name to NoType after its scope', () => {
        const symbols = new SymbolTable();
        const z = symbols.findOrAdd('z');
        symbols.enterScope();
        symbols.declare(z, { type: SymbolType.LocalVar, scope: ScopeType.Local, vartype: BuiltinType.Int, ...at });
        symbols.exitScope();
        expect(symbols.typeOf(z)).toBe(SymbolType.NoType);
    });
});

describe('isRefinement', () => {
    it('should only allow forward refinements', () => {
        expect(isRefinement(SymbolType.NoType, SymbolType.Function)).toBe(true);
        expect(isRefinement(SymbolType.UndefinedStruct, SymbolType.Vartype)).toBe(true);
        expect(isRefinement(SymbolType.StructComponent, SymbolType.GlobalVar)).toBe(true);
        expect(isRefinement(SymbolType.Vartype, SymbolType.UndefinedStruct)).toBe(false);
        expect(isRefinement(SymbolType.Function, SymbolType.GlobalVar)).toBe(false);
    });
});
