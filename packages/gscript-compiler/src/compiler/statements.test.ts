import { describe, it, expect } from 'vitest';
import { compileToModule, validate } from './index.ts';
import { cellToFloat } from './codegen.ts';
import { FixupType } from '../module/types.ts';

const options = { emitLineNumbers: false };

describe('Control flow', () => {
    it('should compile if/else with forward jumps', () => {
        const source = `
int flag;
void f() {
    if (flag)
        flag = 0;
    else
        flag = 1;
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            6, 2, 0,        // LITTOREG mar, flag
            7, 3,           // MEMREAD ax
            28, 10,         // JZ else
            6, 3, 0,
            6, 2, 0,
            8, 3,
            31, 8,          // JMP end
            6, 3, 1,        // else:
            6, 2, 0,
            8, 3,
            6, 3, 0,        // end:
            5,
        ]);
        expect(module.fixups.map(f => f.codeLoc)).toEqual([2, 12, 22]);
    });

    it('should compile a switch with its tests after the body', () => {
        const source = `
int result;
void f(int v) {
    switch (v) {
        case 1:
            result = 10;
            break;
        default:
            result = 20;
    }
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            51, 8,          // LOADSPOFFS 8 (v)
            7, 3,
            29, 3,          // PUSHREG ax
            31, 20,         // JMP tests
            6, 3, 10,       // case 1:
            6, 2, 0,
            8, 3,
            31, 27,         // break
            6, 3, 20,       // default:
            6, 2, 0,
            8, 3,
            31, 17,         // JMP end
            6, 3, 1,        // tests:
            3, 3, 4,        // REGTOREG ax, bx
            51, 4,
            7, 3,
            15, 3, 4,       // ISEQUAL ax, bx
            70, -35,        // JNZ case 1
            31, -27,        // JMP default
            2, 1, 4,        // end: SUB sp, 4
            6, 3, 0,
            5,
        ]);
    });

    it('should test the condition of do/while after the body', () => {
        const source = `
int n;
void f() {
    do {
        n++;
    } while (n < 10);
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            6, 2, 0,        // top: LITTOREG mar, n
            7, 3,
            1, 3, 1,        // ADD ax, 1
            8, 3,
            6, 2, 0,        // next:
            7, 3,
            29, 3,
            6, 3, 10,
            3, 3, 4,
            30, 3,
            18, 3, 4,       // LESSTHAN ax, bx
            70, -30,        // JNZ top
            6, 3, 0,
            5,
        ]);
    });

    it('should continue a for loop at its increment', () => {
        const source = `
int total;
void f() {
    int i;
    for (i = 0; i < 3; i++) {
        if (i == 1)
            continue;
        total += i;
    }
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            51, 0,          // int i
            63, 4,
            1, 1, 4,
            51, 4,          // i = 0
            6, 3, 0,
            8, 3,
            51, 4,          // top: i < 3
            7, 3,
            29, 3,
            6, 3, 3,
            3, 3, 4,
            30, 3,
            18, 3, 4,
            28, 50,         // JZ end
            51, 4,          // i == 1
            7, 3,
            29, 3,
            6, 3, 1,
            3, 3, 4,
            30, 3,
            15, 3, 4,
            28, 2,
            31, 18,         // continue
            51, 4,          // total += i
            7, 3,
            29, 3,
            6, 2, 0,
            30, 4,
            7, 3,
            11, 3, 4,
            8, 3,
            51, 4,          // next: i++
            7, 3,
            1, 3, 1,
            8, 3,
            31, -69,        // JMP top
            2, 1, 4,        // end: SUB sp, 4
            6, 3, 0,
            5,
        ]);
        expect(module.fixups.map(f => f.codeLoc)).toEqual([62]);
    });

    it('should release pointer locals when break leaves nested blocks', () => {
        const source = `
managed struct Node {
    int v;
};
void f() {
    while (1) {
        Node *n = new Node;
        {
            break;
        }
    }
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            6, 3, 1,        // top:
            28, 26,         // JZ end
            73, 3, 4,       // NEWUSEROBJECT ax, 4
            51, 0,
            50, 3,          // MEMINITPTR ax
            1, 1, 4,
            51, 4,          // break: release n
            49,
            2, 1, 4,        // SUB sp, 4
            31, 8,          // JMP end
            51, 4,          // end of block: release n
            49,
            2, 1, 4,
            31, -31,        // JMP top
            6, 3, 0,        // end:
            5,
        ]);
    });

    it('should reject break and continue outside of loops', () => {
        expect(validate('void f() {\n    break;\n}\n'))
            .toBe("main(2): error: 'break' outside of a loop or switch");
        expect(validate('void f(int v) {\n    switch (v) {\n        case 1:\n            continue;\n    }\n}\n'))
            .toBe("main(4): error: 'continue' outside of a loop");
    });

    it('should reject declarations directly in a switch body', () => {
        expect(validate('void f(int v) {\n    switch (v) {\n        case 1:\n            int x;\n    }\n}\n'))
            .toBe('main(4): error: Local variables in a switch must be declared inside a block');
    });
});

describe('Values and types', () => {
    it('should load float literals as single precision cells', () => {
        const module = compileToModule('float speed;\nvoid f() {\n    speed = 1.5;\n}\n', options);

        expect(module.code[2]).toBe(0x3FC00000);
        expect(cellToFloat(module.code[2] ?? 0)).toBe(1.5);
    });

    it('should reject assigning a float to an int', () => {
        expect(validate('int a;\nfloat b;\nvoid f() {\n    a = b;\n}\n'))
            .toBe("main(4): error: Type mismatch: cannot convert 'float' to 'int' in assignment");
    });

    it('should reject a managed struct by value', () => {
        expect(validate('managed struct Node {\n    int v;\n};\nNode n;\n'))
            .toBe("main(4): error: Managed struct 'Node' can only be used through a pointer ('Node*')");
    });

    it('should normalize && and || to 0 or 1', () => {
        const source = `
int a;
int b;
void f() {
    a = 1 && 5;
    b = 7 || 0;
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            6, 3, 1,
            28, 3,          // JZ past the right operand
            6, 3, 5,
            42, 3,          // NOTREG ax
            42, 3,
            6, 2, 0,
            8, 3,
            6, 3, 7,
            70, 3,          // JNZ past the right operand
            6, 3, 0,
            42, 3,
            42, 3,
            6, 2, 4,
            8, 3,
            6, 3, 0,
            5,
        ]);
        expect(module.fixups.map(f => f.codeLoc)).toEqual([14, 31]);
    });

    it('should select a value with ?:', () => {
        const source = `
int a;
void f(int c) {
    a = c ? 10 : 20;
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code)).toEqual([
            51, 8,          // LOADSPOFFS 8 (c)
            7, 3,
            28, 5,          // JZ else
            6, 3, 10,
            31, 3,          // JMP end
            6, 3, 20,       // else:
            6, 2, 0,        // end:
            8, 3,
            6, 3, 0,
            5,
        ]);
    });

    it('should read, modify and write with +=', () => {
        const module = compileToModule('int total;\nvoid f() {\n    total += 3;\n}\n', options);

        expect(Array.from(module.code)).toEqual([
            6, 3, 3,
            29, 3,          // PUSHREG ax
            6, 2, 0,
            30, 4,          // POPREG bx
            7, 3,
            11, 3, 4,       // ADDREG ax, bx
            8, 3,
            6, 3, 0,
            5,
        ]);
        expect(module.fixups.map(f => f.codeLoc)).toEqual([7]);
    });

    it('should address parameters past the pushed operand of -=', () => {
        const module = compileToModule('void f(int n) {\n    n -= 2;\n}\n', options);
        expect(Array.from(module.code)).toEqual([6, 3, 2, 29, 3, 51, 12, 30, 4, 7, 3, 12, 3, 4, 8, 3, 6, 3, 0, 5]);
    });

    it('should accept the smallest integer', () => {
        const module = compileToModule('int low = -2147483648;\nint m;\nvoid f() {\n    m = -2147483648;\n}\n', options);

        expect(Array.from(module.globalData.slice(0, 4))).toEqual([0, 0, 0, 128]);
        expect(module.code[2]).toBe(-2147483648);
        expect(validate('int m;\nvoid f() {\n    m = 2147483648;\n}\n'))
            .toBe("main(3): error: Integer literal '2147483648' is out of range");
    });

    it('should start enum values at 1', () => {
        const module = compileToModule('enum Color { Red, Green = 5, Blue };\nint c;\nvoid f() {\n    c = Blue;\n}\n', options);
        expect(Array.from(module.code.slice(0, 3))).toEqual([6, 3, 6]);
    });

    it('should fill in default arguments', () => {
        const source = `
import void Wait(int frames = 1);
void f() {
    Wait();
}
`;
        const module = compileToModule(source, options);

        expect(Array.from(module.code.slice(0, 5))).toEqual([6, 3, 1, 34, 3]);
        expect(module.fixups).toEqual([{ codeLoc: 9, type: FixupType.Import, target: 0 }]);
    });
});
