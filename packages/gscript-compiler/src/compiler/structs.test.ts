import { describe, it, expect } from 'vitest';
import { compile, compileToModule, validate } from './index.ts';
import { BuiltinType } from './type-registry.ts';
import { FixupType } from '../module/types.ts';

const options = { emitLineNumbers: false };

describe('Structs', () => {
    it('should lay out fields with natural alignment', () => {
        const source = `
struct Point {
    int x;
    short y;
};
Point origin;
void f() {
    origin.y = 2;
}
`;
        const result = compile(source, options);
        expect(result.error).toBeNull();

        const point = result.symbols.get(result.symbols.findOrAdd('Point')).vartype;
        expect(result.types.sizeOf(point)).toBe(8);
        expect(result.types.findMember(point, 'y', 'Accessing')?.vartype).toBe(BuiltinType.Short);

        expect(Array.from(result.module?.code ?? [])).toEqual([
            6, 3, 2,
            6, 2, 0,        // LITTOREG mar, origin
            1, 2, 4,        // ADD mar, 4
            27, 3,          // MEMWRITEW ax
            6, 3, 0,
            5,
        ]);
        expect(result.module?.globalData).toHaveLength(8);
    });

    it('should create managed objects with new', () => {
        const source = `
managed struct Node {
    int v;
};
Node *head;
void f() {
    head = new Node;
}
`;
        const module = compileToModule(source, options);
        expect(Array.from(module.code)).toEqual([73, 3, 4, 6, 2, 0, 47, 3, 6, 3, 0, 5]);
    });

    it('should reach fields through this in member functions', () => {
        const source = `
managed struct Counter {
    int value;
    void Bump();
};
void Counter::Bump() {
    this.value++;
}
`;
        const module = compileToModule(source, options);
        expect(Array.from(module.code)).toEqual([
            3, 6, 2,        // REGTOREG op, mar
            7, 3,
            1, 3, 1,
            8, 3,
            6, 3, 0,
            5,
        ]);
    });

    it('should call member functions through a pointer and release pointer parameters', () => {
        const source = `
managed struct Counter {
    int value;
    void Bump();
};
void Counter::Bump() {
    this.value++;
}
void f(Counter *c) {
    c.Bump();
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code.slice(14))).toEqual([
            51, 8,          // LOADSPOFFS 8 (c)
            7, 3,
            50, 3,          // MEMINITPTR ax
            51, 8,
            48, 3,          // MEMREADPTR ax
            3, 3, 2,        // REGTOREG ax, mar
            52,             // CHECKNULL
            45, 2,          // CALLOBJ mar
            6, 3, 0,        // LITTOREG ax, Counter::Bump
            23, 3,          // CALL ax
            51, 8,
            49,             // MEMZEROPTR
            6, 3, 0,
            5,
        ]);
        expect(module.fixups).toEqual([{ codeLoc: 32, type: FixupType.Function, target: 0 }]);
    });

    it('should call attribute setters on imported objects', () => {
        const source = `
builtin managed struct Character {
    import attribute int X;
};
import readonly Character *player;
void f() {
    player.X = 5;
}
`;
        const module = compileToModule(source, options);

        expect(module.imports.map(i => i.name)).toEqual(['Character::get_X', 'Character::set_X', 'player']);
        expect(Array.from(module.code)).toEqual([
            6, 3, 5,
            34, 3,          // PUSHREAL ax
            6, 2, 2,        // LITTOREG mar, import player
            48, 3,
            3, 3, 2,
            52,
            45, 2,
            39, 1,          // NUMFUNCARGS 1
            6, 3, 1,        // LITTOREG ax, import Character::set_X
            33, 3,
            35, 1,
            6, 3, 0,
            5,
        ]);
        expect(module.fixups.map(f => [f.codeLoc, f.type, f.target])).toEqual([
            [7, FixupType.Import, 2],
            [20, FixupType.Import, 1],
        ]);
    });

    it('should keep protected members behind this', () => {
        const source = 'struct Box {\n    protected int secret;\n};\nBox b;\nvoid f() {\n    b.secret = 1;\n}\n';
        expect(validate(source))
            .toBe("main(6): error: 'Box::secret' is protected and can only be accessed through 'this'");
    });

    it('should reject writing a readonly import', () => {
        const source = 'import readonly int frame;\nvoid f() {\n    frame = 1;\n}\n';
        expect(validate(source)).toBe("main(3): error: Cannot assign to 'frame': it is declared 'readonly'");
    });
});
