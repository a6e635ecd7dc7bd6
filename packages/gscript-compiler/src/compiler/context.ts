/**
 * gscript Compilation Context
 *
 * SPDX-License-Identifier: MIT
 *
 * Everything one compilation unit owns. A context is created per call of
 * the driver and threaded through every stage; nothing is shared between
 * units.
 */

import { SymbolType, ScopeType } from './types.ts';
import type { Symbol, Vartype } from './types.ts';
import { SymbolTable } from './symbol-table.ts';
import type { FunctionInfo, SymbolEntry } from './symbol-table.ts';
import { TypeRegistry } from './type-registry.ts';
import { StringRepository, GlobalDataSegment, ImportTable } from './segments.ts';
import { MessageHandler, Severity } from './message-handler.ts';
import { InternalError } from './errors.ts';
import { createCodeBuffer, emit, loadFrameAddress, shrinkStack, unwindStack } from './codegen.ts';
import type { CodeBuffer, Label } from './codegen.ts';
import { Opcode } from '../module/opcodes.ts';
import type { SectionMark } from '../module/types.ts';
import type { ResolvedOptions } from './options.ts';

// ============================================================================
// Function State
// ============================================================================

/**
 * A block scope inside a function body.
 */
export interface LocalScope {
    /** Stack depth when the scope opened */
    startDepth: number;
    /** Frame positions of the pointer variables released on exit */
    pointerSlots: number[];
}

/**
 * Targets of `break` and `continue`. A switch has no continue target.
 */
export interface LoopContext {
    breakLabel: Label;
    continueLabel: Label | null;
    /** Stack depth at the labels */
    depth: number;
    /** Open scopes when the loop started */
    scopeCount: number;
}

export interface FunctionContext {
    symbol: Symbol;
    name: string;
    info: FunctionInfo;
    /** Struct of a member function */
    ownerStruct: Vartype | null;
    isStatic: boolean;
    scopes: LocalScope[];
    loops: LoopContext[];
}

// ============================================================================
// Compilation Context
// ============================================================================

export class CompilationContext {
    readonly symbols = new SymbolTable();
    readonly types: TypeRegistry;
    readonly strings = new StringRepository();
    readonly globals = new GlobalDataSegment();
    readonly imports = new ImportTable();
    readonly messages = new MessageHandler();
    readonly code: CodeBuffer;
    readonly options: ResolvedOptions;
    readonly sections: SectionMark[] = [];

    /** The function whose body is being compiled */
    fn: FunctionContext | null = null;

    constructor(options: ResolvedOptions) {
        this.options = options;
        this.types = new TypeRegistry(this.symbols);
        this.code = createCodeBuffer(options.emitLineNumbers);
    }

    warn(message: string, section: string, line: number): void {
        this.messages.addMessage(Severity.Warning, section, line, message);
    }

    log(message: string): void {
        if (this.options.verbose) {
            console.debug(`[gscript] ${message}`);
        }
    }

    /**
     * Record that code of `section` starts here, once per section.
     */
    markSection(section: string): void {
        const last = this.sections[this.sections.length - 1];
        if (last === undefined || last.name !== section) {
            this.sections.push({ name: section, codeLoc: this.code.code.length });
        }
    }

    currentFunction(): FunctionContext {
        if (this.fn === null) {
            throw new InternalError('Not inside a function body');
        }
        return this.fn;
    }

    // ========================================================================
    // Local Scopes
    // ========================================================================

    openScope(): void {
        this.symbols.enterScope();
        this.currentFunction().scopes.push({ startDepth: this.code.depth, pointerSlots: [] });
    }

    /**
     * Close the innermost scope: release its pointers, pop its locals and
     * warn about those never read.
     */
    closeScope(): void {
        const scope = this.currentFunction().scopes.pop();
        if (scope === undefined) {
            throw new InternalError('Local scope stack underflow');
        }
        this.releasePointers(scope, false);
        shrinkStack(this.code, this.code.depth - scope.startDepth);
        this.reportUnused(this.symbols.exitScope());
    }

    /**
     * Track a pointer variable of the innermost scope.
     */
    addPointerSlot(position: number): void {
        const scopes = this.currentFunction().scopes;
        const scope = scopes[scopes.length - 1];
        if (scope === undefined) {
            throw new InternalError('Pointer variable outside of a scope');
        }
        scope.pointerSlots.push(position);
    }

    /**
     * Release the pointers and stack of the scopes from `scopeCount` up,
     * on a path that jumps out of them. Returns the depth after unwinding.
     */
    unwindScopes(scopeCount: number, keepReturnValue: boolean): number {
        const scopes = this.currentFunction().scopes;
        for (let i = scopes.length - 1; i >= scopeCount; i--) {
            const scope = scopes[i];
            if (scope !== undefined) this.releasePointers(scope, keepReturnValue);
        }
        const target = scopes[scopeCount]?.startDepth ?? this.code.depth;
        unwindStack(this.code, this.code.depth - target);
        return target;
    }

    private releasePointers(scope: LocalScope, keepReturnValue: boolean): void {
        for (const position of scope.pointerSlots) {
            loadFrameAddress(this.code, position);
            emit(this.code, keepReturnValue ? Opcode.MEMZEROPTRND : Opcode.MEMZEROPTR);
        }
    }

    private reportUnused(locals: SymbolEntry[]): void {
        if (!this.options.warnUnused) return;
        for (const entry of locals) {
            if (entry.type !== SymbolType.LocalVar || entry.scope !== ScopeType.Local) continue;
            if (entry.flags.has('accessed')) continue;
            const kind = entry.offset < 0 ? 'Parameter' : 'Local variable';
            this.warn(`${kind} '${entry.name}' is never used`, entry.section, entry.line);
        }
    }
}
