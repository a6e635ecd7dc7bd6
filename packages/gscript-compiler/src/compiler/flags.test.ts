import { describe, it, expect } from 'vitest';
import { TypeQualifierSet, SymbolFlagSet, IMPORT_MASK, findConflictingQualifier } from './flags.ts';

describe('TypeQualifierSet', () => {
    it('should map qualifiers to the fixed bit layout', () => {
        expect(TypeQualifierSet.of('attribute').toBits()).toBe(1);
        expect(TypeQualifierSet.of('const').toBits()).toBe(8);
        expect(TypeQualifierSet.of('writeprotected').toBits()).toBe(2048);
        expect(TypeQualifierSet.of('managed', 'autoptr').toBits()).toBe(64 | 2);
    });

    it('should treat both import flavours as imported', () => {
        expect(IMPORT_MASK).toBe(48);
        expect(TypeQualifierSet.of('importstd').isImport()).toBe(true);
        expect(TypeQualifierSet.of('importtry').isImport()).toBe(true);
        expect(TypeQualifierSet.of('static').isImport()).toBe(false);
    });

    it('should round-trip through bits', () => {
        const set = TypeQualifierSet.of('protected', 'static', 'readonly');
        const copy = TypeQualifierSet.fromBits(set.toBits());
        expect(copy.equals(set)).toBe(true);
        expect(copy.values()).toEqual(['protected', 'readonly', 'static']);
    });

    it('should add idempotently and delete', () => {
        const set = TypeQualifierSet.of('const');
        set.add('const');
        expect(set.toBits()).toBe(8);
        set.delete('const');
        expect(set.isEmpty()).toBe(true);
    });

    it('should clone independently', () => {
        const set = TypeQualifierSet.of('static');
        const copy = set.clone().add('const');
        expect(set.has('const')).toBe(false);
        expect(copy.hasAny('const', 'readonly')).toBe(true);
    });
});

describe('SymbolFlagSet', () => {
    it('should use the symbol flag layout', () => {
        expect(SymbolFlagSet.of('accessed').toBits()).toBe(1);
        expect(SymbolFlagSet.of('structvartype').toBits()).toBe(64);
        expect(SymbolFlagSet.of('exported', 'noloopcheck').toBits()).toBe(128 | 2);
    });
});

describe('findConflictingQualifier', () => {
    it('should find conflicts in either direction', () => {
        expect(findConflictingQualifier(TypeQualifierSet.of('const'), 'readonly')).toBe('const');
        expect(findConflictingQualifier(TypeQualifierSet.of('writeprotected'), 'protected')).toBe('writeprotected');
        expect(findConflictingQualifier(TypeQualifierSet.of('importstd'), 'importtry')).toBe('importstd');
    });

    it('should accept compatible qualifiers', () => {
        expect(findConflictingQualifier(TypeQualifierSet.of('static', 'protected'), 'readonly')).toBeUndefined();
    });
});
