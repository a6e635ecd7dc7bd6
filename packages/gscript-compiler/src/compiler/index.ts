/**
 * gscript Compiler
 *
 * SPDX-License-Identifier: MIT
 *
 * Compiles game scripts to relocatable bytecode modules.
 *
 * Usage:
 *   import { compile, compileToModule } from '@gscript/compiler';
 *
 *   // Diagnostics and the module, never throws for script errors
 *   const result = compile(source);
 *   for (const message of result.messages) console.log(formatMessage(message));
 *
 *   // Module or exception
 *   const module = compileToModule(source);
 */

// =============================================================================
// Component exports
// =============================================================================
export { SymbolType, ScopeType, Sizes, MAX_FUNCTION_PARAMETERS, describeSymbolType } from './types.ts';
export type { Symbol, Vartype, CodeCell, CodeLoc, StringsLoc, GlobalLoc, SymbolTypeValue, ScopeTypeValue } from './types.ts';
export { TypeQualifierSet, SymbolFlagSet, TypeQualifierBit, SymbolFlagBit } from './flags.ts';
export type { TypeQualifier, SymbolFlag } from './flags.ts';
export { MessageHandler, Severity, NO_ERROR, formatMessage, severityName } from './message-handler.ts';
export type { MessageEntry, SeverityValue } from './message-handler.ts';
export { CompilerError, UserError, InternalError } from './errors.ts';
export { SymbolTable } from './symbol-table.ts';
export type { SymbolEntry, FunctionInfo, ParamInfo } from './symbol-table.ts';
export { TypeRegistry, BuiltinType } from './type-registry.ts';
export type { TypeEntry, StructType, StructMember } from './type-registry.ts';
export { scan } from './scanner.ts';
export type { ScannedSymbol } from './scanner.ts';
export { Parser } from './parser.ts';
export { buildExports } from './exporter.ts';
export { CompilationContext } from './context.ts';
export { DEFAULT_OPTIONS, resolveOptions } from './options.ts';
export type { CompileOptions } from './options.ts';

// =============================================================================
// Internal imports for main functions
// =============================================================================
import { CompilationContext } from './context.ts';
import { Parser } from './parser.ts';
import { scan } from './scanner.ts';
import { buildExports } from './exporter.ts';
import { CompilerError, UserError, InternalError } from './errors.ts';
import { Severity, formatMessage } from './message-handler.ts';
import type { MessageEntry } from './message-handler.ts';
import type { SymbolTable } from './symbol-table.ts';
import type { TypeRegistry } from './type-registry.ts';
import { resolveOptions } from './options.ts';
import type { CompileOptions } from './options.ts';
import { NEW_SECTION_MARKER } from './vocabulary.ts';
import type { ScriptModule } from '../module/types.ts';
import { validateFixups } from '../module/linker.ts';

// =============================================================================
// Result types
// =============================================================================

/**
 * Outcome of compiling one unit.
 */
export interface CompileResult {
    /** The module; null when compilation failed */
    module: ScriptModule | null;
    /** Diagnostics in the order they were raised */
    messages: MessageEntry[];
    /** The first error, or null */
    error: MessageEntry | null;
    /** Symbol table of the unit, for inspection */
    symbols: SymbolTable;
    /** Type registry of the unit, for inspection */
    types: TypeRegistry;
}

/**
 * One named piece of source, e.g. a header followed by the script.
 */
export interface SourceSection {
    name: string;
    source: string;
}

// =============================================================================
// Main compilation functions
// =============================================================================

/**
 * Compile one source text.
 *
 * Script errors do not throw: the first one ends the compilation and is
 * reported in `error` and `messages`.
 *
 * @example
 * ```typescript
 * const result = compile('int score; void bump() { score = score + 1; }');
 * if (result.error !== null) console.log(formatMessage(result.error));
 * ```
 */
export function compile(source: string, options?: CompileOptions): CompileResult {
    const resolved = resolveOptions(options);
    const ctx = new CompilationContext(resolved);

    let module: ScriptModule | null = null;
    try {
        const input = scan(source, ctx.symbols, ctx.strings, resolved.sectionName);
        ctx.log(`scanned ${input.length} symbols, ${ctx.strings.count} string literals`);

        new Parser(ctx, input).parse();
        const exports = buildExports(ctx.symbols, ctx.types);
        module = buildModule(ctx, exports);
        validateFixups(module);
        ctx.log(
            `module: ${module.code.length} cells, ${module.fixups.length} fixups, `
            + `${module.imports.length} imports, ${module.exports.length} exports`,
        );
    } catch (error) {
        recordError(ctx, error);
        module = null;
    }

    const messages = ctx.messages.getMessages();
    const error = ctx.messages.hasError() ? ctx.messages.getError() : null;
    return { module, messages, error, symbols: ctx.symbols, types: ctx.types };
}

/**
 * Compile several sections as one unit, e.g. headers before the script.
 * Diagnostics name the section they occur in.
 */
export function compileSections(sections: readonly SourceSection[], options?: CompileOptions): CompileResult {
    const source = sections
        .map(s => `"${NEW_SECTION_MARKER}${s.name}"\n${s.source}\n`)
        .join('');
    return compile(source, options);
}

/**
 * Compile and return the module.
 *
 * @throws CompilerError (UserError or InternalError) for the first error
 */
export function compileToModule(source: string, options?: CompileOptions): ScriptModule {
    const result = compile(source, options);
    if (result.module === null) {
        const error = result.error;
        if (error === null) {
            throw new InternalError('Compilation failed without an error message');
        }
        throw error.severity === Severity.InternalError
            ? new InternalError(error.message, error.section, error.line)
            : new UserError(error.message, error.section, error.line);
    }
    return result.module;
}

/**
 * Validate source code without keeping the module.
 *
 * @returns null if valid, the rendered first error otherwise
 */
export function validate(source: string, options?: CompileOptions): string | null {
    const result = compile(source, options);
    return result.error === null ? null : formatMessage(result.error);
}

// =============================================================================
// Helpers
// =============================================================================

function recordError(ctx: CompilationContext, error: unknown): void {
    if (error instanceof InternalError) {
        ctx.messages.addMessage(Severity.InternalError, error.section, error.line, error.detail);
        return;
    }
    if (error instanceof CompilerError) {
        ctx.messages.addMessage(Severity.Error, error.section, error.line, error.detail);
        return;
    }
    const message = error instanceof Error ? error.message : String(error);
    ctx.messages.addMessage(Severity.InternalError, '', 0, message);
}

function buildModule(ctx: CompilationContext, exports: ScriptModule['exports']): ScriptModule {
    const cells = ctx.code.code;
    const fixups = ctx.code.fixups.map(f => ({
        codeLoc: f.codeLoc,
        type: f.type,
        target: cells[f.codeLoc] ?? 0,
    }));
    return {
        code: Int32Array.from(cells),
        fixups,
        globalData: ctx.globals.toBytes(),
        strings: ctx.strings.toBytes(),
        imports: ctx.imports.all().map(i => ({ name: i.name, optional: i.optional })),
        exports,
        sections: ctx.sections.map(s => ({ ...s })),
    };
}
