/**
 * @gscript/compiler - Game Script Compiler
 *
 * SPDX-License-Identifier: MIT
 *
 * Compiles a C-like game scripting language into relocatable bytecode
 * modules for a register-based VM.
 *
 * @example
 * ```typescript
 * import { compile, writeModule, disassemble } from '@gscript/compiler';
 *
 * const source = `
 * import void Display(const string text);
 * int counter;
 *
 * void tick() {
 *     counter++;
 *     Display("tick");
 * }
 * export tick;
 * `;
 *
 * const result = compile(source);
 * if (result.module !== null) {
 *     console.log(disassemble(result.module));
 *     const bytes = writeModule(result.module);
 * }
 * ```
 */

export * from './compiler/index.ts';
export * from './module/index.ts';
