/**
 * gscript Parser
 *
 * SPDX-License-Identifier: MIT
 *
 * Recursive descent over the scanned symbols. Declarations update the
 * symbol table and type registry as they are recognized; statements drive
 * the code generator directly. Each expression is parsed into a transient
 * tree that the expression emitter checks and emits right away.
 */

import { SymbolType, ScopeType, Sizes, MAX_FUNCTION_PARAMETERS, alignTo, describeSymbolType } from './types.ts';
import type { Vartype, SymbolTypeValue } from './types.ts';
import { TypeQualifierSet, findConflictingQualifier } from './flags.ts';
import type { TypeQualifier } from './flags.ts';
import type { SymbolTable, SymbolEntry, FunctionInfo, ParamInfo, Declaration } from './symbol-table.ts';
import { BuiltinType } from './type-registry.ts';
import type { TypeRegistry, StructMember } from './type-registry.ts';
import { CompilerError, UserError, InternalError } from './errors.ts';
import { QUALIFIER_KEYWORDS } from './vocabulary.ts';
import type { ScannedSymbol } from './scanner.ts';
import type { CompilationContext } from './context.ts';
import {
    emit,
    emitJump,
    emitLineNumber,
    newLabel,
    placeLabel,
    patchCell,
    pushReg,
    growStack,
    shrinkStack,
    loadFrameAddress,
    floatToCell,
} from './codegen.ts';
import type { Label } from './codegen.ts';
import { emitExpression, emitConverted, emitCondition, emitSimpleStatement } from './expressions.ts';
import { isBinaryOperator, isModifyOperator } from './ast.ts';
import type { Expression, BinaryOperator, SimpleStatement, CallExpr } from './ast.ts';
import { Opcode, Register } from '../module/opcodes.ts';
import type { OpcodeValue } from '../module/opcodes.ts';
import { MODULE_CONSTANTS } from '../module/types.ts';

// ============================================================================
// Grammar Tables
// ============================================================================

type QualifierContext = 'global' | 'member' | 'local' | 'parameter';

const ALLOWED_QUALIFIERS: Record<QualifierContext, ReadonlySet<TypeQualifier>> = {
    global: new Set<TypeQualifier>([
        'importstd', 'importtry', 'static', 'readonly', 'const',
        'managed', 'builtin', 'autoptr', 'stringstruct',
    ]),
    member: new Set<TypeQualifier>([
        'importstd', 'importtry', 'static', 'readonly', 'protected', 'writeprotected', 'attribute',
    ]),
    local: new Set<TypeQualifier>(['const']),
    parameter: new Set<TypeQualifier>(['const']),
};

const QUALIFIER_PLACES: Record<QualifierContext, string> = {
    global: 'outside of a struct',
    member: 'on a struct member',
    local: 'on a local variable',
    parameter: 'on a parameter',
};

/** Statements that need a function around them */
const FUNCTION_ONLY_STATEMENTS: ReadonlySet<string> = new Set([
    '{', 'if', 'while', 'do', 'for', 'switch', 'break', 'continue', 'return', 'case', 'default',
]);

/** Qualifiers that only apply to struct declarations */
const STRUCT_QUALIFIERS: readonly TypeQualifier[] = ['managed', 'builtin', 'autoptr', 'stringstruct'];

/**
 * Binding strength of the binary operators; all are left associative.
 */
const PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
    '||': 1,
    '&&': 2,
    '==': 3, '!=': 3,
    '<': 4, '>': 4, '<=': 4, '>=': 4,
    '|': 5,
    '^': 6,
    '&': 7,
    '<<': 8, '>>': 8,
    '+': 9, '-': 9,
    '*': 10, '/': 10, '%': 10,
};

/** Symbol types that can never name a declaration */
const NON_NAME_TYPES: ReadonlySet<SymbolTypeValue> = new Set<SymbolTypeValue>([
    SymbolType.Delimiter,
    SymbolType.Operator,
    SymbolType.Assign,
    SymbolType.AssignMod,
    SymbolType.AssignSOp,
    SymbolType.Keyword,
    SymbolType.Import,
    SymbolType.LiteralInt,
    SymbolType.LiteralFloat,
    SymbolType.LiteralString,
    SymbolType.Vartype,
    SymbolType.UndefinedStruct,
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function qualifierOf(keyword: string): TypeQualifier | undefined {
    return Object.hasOwn(QUALIFIER_KEYWORDS, keyword) ? QUALIFIER_KEYWORDS[keyword] : undefined;
}

function keywordOf(qualifier: TypeQualifier): string {
    return Object.keys(QUALIFIER_KEYWORDS).find(k => QUALIFIER_KEYWORDS[k] === qualifier) ?? qualifier;
}

/** A source position */
interface Position {
    section: string;
    line: number;
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Single-pass parser and semantic analyzer for one compilation unit.
 */
export class Parser {
    private readonly ctx: CompilationContext;
    private readonly input: readonly ScannedSymbol[];
    private readonly end: ScannedSymbol;
    private pos = 0;

    constructor(ctx: CompilationContext, input: readonly ScannedSymbol[]) {
        const end = input[input.length - 1];
        if (end === undefined || end.symbol !== ctx.symbols.endOfInput) {
            throw new InternalError('Parser input must end with the end-of-input symbol');
        }
        this.ctx = ctx;
        this.input = input;
        this.end = end;
    }

    private get symbols(): SymbolTable {
        return this.ctx.symbols;
    }

    private get types(): TypeRegistry {
        return this.ctx.types;
    }

    /**
     * Parse the whole unit. Errors raised without a position are placed at
     * the symbol being processed.
     */
    parse(): void {
        try {
            while (!this.isAtEnd()) {
                this.ctx.markSection(this.current().section);
                this.parseTopLevel();
            }
            this.checkUndefinedFunctions();
        } catch (error) {
            if (error instanceof CompilerError && error.line === 0) {
                const at = this.current();
                throw error.at(at.section, at.line);
            }
            throw error;
        }
    }

    // ========================================================================
    // Utility methods
    // ========================================================================

    private current(): ScannedSymbol {
        return this.input[this.pos] ?? this.end;
    }

    private isAtEnd(): boolean {
        return this.current().symbol === this.symbols.endOfInput;
    }

    private entry(token = this.current()): SymbolEntry {
        return this.symbols.get(token.symbol);
    }

    private text(token = this.current()): string {
        return this.symbols.name(token.symbol);
    }

    private peekText(offset = 1): string {
        return this.text(this.input[this.pos + offset] ?? this.end);
    }

    private is(text: string): boolean {
        return this.text() === text;
    }

    private advance(): ScannedSymbol {
        const token = this.current();
        if (!this.isAtEnd()) this.pos++;
        return token;
    }

    private accept(text: string): boolean {
        if (!this.is(text)) return false;
        this.advance();
        return true;
    }

    private expect(text: string, context = ''): ScannedSymbol {
        if (!this.is(text)) {
            this.error(`Expected '${text}'${context ? ` ${context}` : ''}, found ${this.describe()}`);
        }
        return this.advance();
    }

    private error(message: string, at: Position = this.current()): never {
        throw new UserError(message, at.section, at.line);
    }

    /**
     * Run `action`, placing errors it raises without a position at `at`.
     */
    private at<T>(at: Position, action: () => T): T {
        try {
            return action();
        } catch (error) {
            if (error instanceof CompilerError && error.line === 0) {
                throw error.at(at.section, at.line);
            }
            throw error;
        }
    }

    private describe(token = this.current()): string {
        if (token.symbol === this.symbols.endOfInput) return 'the end of the input';
        return `'${this.text(token)}'`;
    }

    /**
     * Consume a symbol that can name a declaration.
     */
    private expectName(what: string): ScannedSymbol {
        const token = this.current();
        const entry = this.entry(token);
        if (token.symbol === this.symbols.endOfInput || !IDENTIFIER.test(entry.name) || NON_NAME_TYPES.has(entry.type)) {
            this.error(`Expected ${what}, found ${this.describe(token)} (${describeSymbolType(entry.type)})`);
        }
        if (entry.name === 'this') {
            this.error("'this' is reserved and cannot be declared");
        }
        return this.advance();
    }

    private declare(token: ScannedSymbol, declaration: Omit<Declaration, 'section' | 'line'>): SymbolEntry {
        return this.at(token, () => this.symbols.declare(token.symbol, {
            ...declaration,
            section: token.section,
            line: token.line,
        }));
    }

    // ========================================================================
    // Qualifiers and Types
    // ========================================================================

    /**
     * Collect qualifier keywords left to right. Duplicates, conflicts and
     * qualifiers illegal in `context` fail at the offending keyword.
     */
    private parseQualifiers(context: QualifierContext): TypeQualifierSet {
        const qualifiers = new TypeQualifierSet();
        for (;;) {
            const keyword = this.text();
            const qualifier = qualifierOf(keyword);
            if (qualifier === undefined) return qualifiers;

            if (!ALLOWED_QUALIFIERS[context].has(qualifier)) {
                this.error(`'${keyword}' is not allowed ${QUALIFIER_PLACES[context]}`);
            }
            if (qualifiers.has(qualifier)) {
                this.error(`'${keyword}' is given twice`);
            }
            const conflict = findConflictingQualifier(qualifiers, qualifier);
            if (conflict !== undefined) {
                this.error(`'${keyword}' cannot be combined with '${keywordOf(conflict)}'`);
            }
            qualifiers.add(qualifier);
            this.advance();
        }
    }

    /**
     * Parse a type name with an optional `*`. Autoptr structs denote their
     * pointer type without it.
     */
    private parseType(): Vartype {
        const token = this.current();
        if (this.accept('function')) return BuiltinType.Int;

        const entry = this.entry(token);
        if (entry.type !== SymbolType.Vartype && entry.type !== SymbolType.UndefinedStruct) {
            this.error(`Expected a type, found ${this.describe(token)}`);
        }
        this.advance();

        const vartype = entry.vartype;
        const isStruct = this.types.isStruct(vartype);
        if (this.is('*')) {
            if (!isStruct) {
                this.error(`'${entry.name}*' is not a type: only managed structs can be pointed to`);
            }
            if (this.types.hasStructQualifier(vartype, 'autoptr')) {
                this.error(`'${entry.name}' is autoptr and is written without '*'`);
            }
            this.advance();
            return this.at(token, () => this.types.pointerTo(vartype));
        }
        if (isStruct && this.types.hasStructQualifier(vartype, 'autoptr')) {
            return this.types.pointerTo(vartype);
        }
        return vartype;
    }

    /**
     * Check that a variable or field can have this type. Returns its size.
     */
    private checkVariableType(vartype: Vartype, usage: string, at: Position): number {
        const types = this.types;
        if (types.isVoid(vartype)) {
            this.error(`${usage}: 'void' is not a variable type`, at);
        }
        if (types.isLiteralString(vartype)) {
            this.error("The 'string' type can only be used for 'const string' parameters", at);
        }
        if (types.isStruct(vartype) && types.hasStructQualifier(vartype, 'managed')) {
            const name = types.describe(vartype);
            this.error(`Managed struct '${name}' can only be used through a pointer ('${name}*')`, at);
        }
        return this.at(at, () => types.sizeOf(vartype, usage));
    }

    private checkReturnType(vartype: Vartype, name: string, at: Position): void {
        if (this.types.isStruct(vartype)) {
            this.error(`Function '${name}' cannot return the struct '${this.types.describe(vartype)}' by value`, at);
        }
        if (this.types.isLiteralString(vartype)) {
            this.error("The 'string' type can only be used for 'const string' parameters", at);
        }
    }

    /**
     * A constant initializer or default value as a raw cell: a literal, a
     * negated literal or a named constant.
     */
    private parseConstantValue(vartype: Vartype, what: string): number {
        const negative = this.accept('-');
        const token = this.current();
        const entry = this.entry(token);
        const types = this.types;

        if (types.isFloat(vartype) && entry.type === SymbolType.LiteralFloat) {
            this.advance();
            return floatToCell(negative ? -entry.value : entry.value);
        }
        if (types.isInteger(vartype)) {
            const isInteger = entry.type === SymbolType.LiteralInt
                || (entry.type === SymbolType.Constant && types.isInteger(entry.vartype));
            if (isInteger) {
                this.advance();
                return negative ? -entry.value | 0 : entry.value;
            }
        }
        if (types.isPointer(vartype) && !negative && entry.type === SymbolType.Constant && types.isNull(entry.vartype)) {
            this.advance();
            return 0;
        }
        this.error(`Expected a constant '${types.describe(vartype)}' value for ${what}, found ${this.describe(token)}`);
    }

    // ========================================================================
    // Top Level
    // ========================================================================

    private parseTopLevel(): void {
        if (this.accept(';')) return;
        if (this.is('export')) {
            this.parseExport();
            return;
        }
        if (this.is('enum')) {
            this.parseEnum();
            return;
        }

        if (FUNCTION_ONLY_STATEMENTS.has(this.text())) {
            this.error(`'${this.text()}' is only allowed inside functions`);
        }
        if (this.isInitializerStatementStart()) {
            this.parseInitializer();
            return;
        }

        const start = this.current();
        const qualifiers = this.parseQualifiers('global');
        if (this.is('struct')) {
            this.parseStruct(qualifiers, start);
            return;
        }
        for (const qualifier of STRUCT_QUALIFIERS) {
            if (qualifiers.has(qualifier)) {
                this.error(`'${keywordOf(qualifier)}' can only be applied to a struct`, start);
            }
        }
        const vartype = this.parseType();
        const noloopcheck = this.accept('noloopcheck');
        if (this.peekText() === '::') {
            this.parseMemberFunctionDefinition(qualifiers, vartype, noloopcheck);
            return;
        }

        const nameToken = this.expectName('a name');
        if (this.is('(')) {
            this.parseFunction(qualifiers, vartype, nameToken, noloopcheck);
            return;
        }
        if (noloopcheck) {
            this.error("'noloopcheck' can only be applied to functions", nameToken);
        }
        this.parseGlobalVariables(qualifiers, vartype, nameToken);
    }

    /**
     * A variable, function call, static member or `++` at the top level.
     */
    private isInitializerStatementStart(): boolean {
        const type = this.entry().type;
        if (type === SymbolType.Vartype || type === SymbolType.UndefinedStruct) {
            return this.peekText() === '.';
        }
        return type === SymbolType.GlobalVar || type === SymbolType.Function || type === SymbolType.AssignSOp;
    }

    /**
     * Simple statements outside of functions run when the module loads.
     * Each run of them is a routine of its own, marked `<section>$init`.
     */
    private parseInitializer(): void {
        const start = this.current();
        const code = this.ctx.code;
        this.ctx.markSection(`${start.section}${MODULE_CONSTANTS.INITIALIZER_SUFFIX}`);
        const codeLoc = code.code.length;
        code.depth = 0;

        do {
            emitLineNumber(code, this.current().line);
            const statement = this.parseSimpleStatement();
            this.expect(';', 'after a statement');
            this.at(statement, () => emitSimpleStatement(this.ctx, statement));
        } while (this.current().section === start.section && this.isInitializerStatementStart());

        emit(code, Opcode.LITTOREG, Register.AX, 0);
        emit(code, Opcode.RET);
        if (code.depth !== 0) {
            throw new InternalError(`Stack depth ${code.depth} at the end of an initializer`);
        }
        this.ctx.log(`initializer: ${code.code.length - codeLoc} cells at ${codeLoc}`);
    }

    private parseExport(): void {
        this.advance();
        do {
            const token = this.expectName('a name to export');
            const entry = this.entry(token);
            const name = entry.name;
            switch (entry.type) {
                case SymbolType.Function:
                    if (entry.qualifiers.isImport()) {
                        this.error(`Cannot export '${name}': it is imported`, token);
                    }
                    if (entry.qualifiers.has('static')) {
                        this.error(`Cannot export '${name}': it is declared 'static'`, token);
                    }
                    break;
                case SymbolType.GlobalVar:
                    if (entry.scope === ScopeType.Import) {
                        this.error(`Cannot export '${name}': it is imported`, token);
                    }
                    break;
                default:
                    this.error(`Cannot export '${name}': it is ${describeSymbolType(entry.type)}, not a global variable or function`, token);
            }
            entry.flags.add('exported', 'accessed');
        } while (this.accept(','));
        this.expect(';', 'after the export list');
    }

    private parseEnum(): void {
        this.advance();
        const nameToken = this.expectName('an enum name');
        const vartype = this.at(nameToken, () => this.types.declareEnum(nameToken.symbol));
        this.expect('{', `after 'enum ${this.text(nameToken)}'`);

        // Enumerators count from 1 unless given a value
        let next = 1;
        while (!this.accept('}')) {
            const token = this.expectName('an enum value');
            const value = this.accept('=')
                ? this.parseConstantValue(BuiltinType.Int, `enum value '${this.text(token)}'`)
                : next;
            this.declare(token, { type: SymbolType.Constant, scope: ScopeType.None, vartype, value });
            next = value + 1;
            if (!this.accept(',')) {
                this.expect('}', 'after the enum values');
                break;
            }
        }
        this.expect(';', 'after an enum declaration');
    }

    // ========================================================================
    // Structs
    // ========================================================================

    private parseStruct(qualifiers: TypeQualifierSet, start: ScannedSymbol): void {
        for (const qualifier of qualifiers.values()) {
            if (!STRUCT_QUALIFIERS.includes(qualifier)) {
                this.error(`'${keywordOf(qualifier)}' cannot be applied to a struct`, start);
            }
        }
        this.advance();

        const nameToken = this.current();
        const entry = this.entry(nameToken);
        const declarable = entry.type === SymbolType.NoType
            || entry.type === SymbolType.UndefinedStruct
            || entry.type === SymbolType.Vartype;
        if (!declarable || !IDENTIFIER.test(entry.name)) {
            this.error(`Expected a struct name, found ${this.describe(nameToken)}`);
        }
        this.advance();
        const name = entry.name;
        const vartype = this.at(nameToken, () => this.types.declareStruct(nameToken.symbol, qualifiers));

        if (this.accept(';')) return;
        if (this.types.isComplete(vartype)) {
            this.error(`Struct '${name}' is already defined`, nameToken);
        }
        if (this.is('extends')) {
            this.error('Struct inheritance is not supported');
        }
        this.expect('{', `after 'struct ${name}'`);

        const members: StructMember[] = [];
        const layout = { size: 0 };
        while (!this.accept('}')) {
            if (this.isAtEnd()) {
                this.error(`Struct '${name}' is not closed`, nameToken);
            }
            this.parseStructMember(vartype, members, layout);
        }
        this.expect(';', `after struct '${name}'`);

        const size = alignTo(layout.size, Sizes.STRUCT_ALIGN);
        this.types.completeStruct(vartype, members, size);
        this.ctx.log(`struct ${name}: ${members.length} members, ${size} bytes`);
    }

    private parseStructMember(struct: Vartype, members: StructMember[], layout: { size: number }): void {
        const start = this.current();
        const qualifiers = this.parseQualifiers('member');
        const vartype = this.parseType();
        let nameToken = this.expectName('a member name');

        if (qualifiers.has('attribute')) {
            this.declareAttribute(struct, members, qualifiers, vartype, nameToken);
            this.expect(';', 'after an attribute declaration');
            return;
        }
        if (this.is('(')) {
            this.declareMemberFunction(struct, members, qualifiers, vartype, nameToken);
            this.expect(';', 'after a member function declaration');
            return;
        }

        for (const qualifier of ['importstd', 'importtry', 'static'] as const) {
            if (qualifiers.has(qualifier)) {
                this.error(`'${keywordOf(qualifier)}' cannot be applied to a struct field`, start);
            }
        }
        for (;;) {
            this.declareField(struct, members, layout, qualifiers, vartype, nameToken);
            if (!this.accept(',')) break;
            nameToken = this.expectName('a member name');
        }
        this.expect(';', 'after a field declaration');
    }

    /**
     * Register the qualified symbol `Struct::name` of a new member.
     */
    private addMemberSymbol(struct: Vartype, members: readonly StructMember[], nameToken: ScannedSymbol): number {
        const structName = this.types.struct(struct).name;
        const name = this.text(nameToken);
        if (members.some(m => m.name === name)) {
            this.error(`'${structName}' already has a member named '${name}'`, nameToken);
        }
        if (this.entry(nameToken).type === SymbolType.NoType) {
            this.symbols.refine(nameToken.symbol, SymbolType.StructComponent);
        }
        return this.symbols.findOrAdd(`${structName}::${name}`);
    }

    private declareField(
        struct: Vartype,
        members: StructMember[],
        layout: { size: number },
        qualifiers: TypeQualifierSet,
        vartype: Vartype,
        nameToken: ScannedSymbol,
    ): void {
        const structName = this.types.struct(struct).name;
        const name = this.text(nameToken);
        const size = this.checkVariableType(vartype, `Declaring field '${structName}.${name}'`, nameToken);
        const symbol = this.addMemberSymbol(struct, members, nameToken);

        const alignment = this.types.isStruct(vartype) ? Sizes.STRUCT_ALIGN : Math.min(size, Sizes.STRUCT_ALIGN);
        const offset = alignTo(layout.size, alignment);
        layout.size = offset + size;

        this.at(nameToken, () => this.symbols.declare(symbol, {
            type: SymbolType.StructComponent,
            scope: ScopeType.None,
            vartype,
            qualifiers,
            offset,
            section: nameToken.section,
            line: nameToken.line,
        }));
        members.push({ name, symbol, kind: 'field', vartype, offset, qualifiers: qualifiers.clone() });
    }

    private declareMemberFunction(
        struct: Vartype,
        members: StructMember[],
        qualifiers: TypeQualifierSet,
        returnType: Vartype,
        nameToken: ScannedSymbol,
    ): void {
        const structName = this.types.struct(struct).name;
        const name = this.text(nameToken);
        const qualified = `${structName}::${name}`;
        this.checkReturnType(returnType, qualified, nameToken);
        if (qualifiers.hasAny('readonly', 'protected', 'writeprotected')) {
            this.error(`Member function '${qualified}' can only be 'import' or 'static'`, nameToken);
        }

        const params = this.parseParameters();
        const symbol = this.addMemberSymbol(struct, members, nameToken);
        const isImport = qualifiers.isImport();
        const fn: FunctionInfo = {
            params,
            returnType,
            codeLoc: -1,
            pendingCalls: [],
            importIndex: isImport ? this.ctx.imports.add(qualified, qualifiers.has('importtry')) : -1,
            ownerStruct: struct,
        };
        this.at(nameToken, () => this.symbols.declare(symbol, {
            type: SymbolType.Function,
            scope: isImport ? ScopeType.Import : ScopeType.Global,
            vartype: returnType,
            qualifiers,
            fn,
            section: nameToken.section,
            line: nameToken.line,
        }));
        members.push({ name, symbol, kind: 'function', vartype: returnType, offset: 0, qualifiers: qualifiers.clone() });
    }

    /**
     * An attribute is backed by imported accessors `Struct::get_Name` and,
     * unless readonly, `Struct::set_Name`.
     */
    private declareAttribute(
        struct: Vartype,
        members: StructMember[],
        qualifiers: TypeQualifierSet,
        vartype: Vartype,
        nameToken: ScannedSymbol,
    ): void {
        const structName = this.types.struct(struct).name;
        const name = this.text(nameToken);
        if (!qualifiers.isImport()) {
            this.error(`Attribute '${structName}.${name}' must be declared 'import'`, nameToken);
        }
        if (this.types.isVoid(vartype) || this.types.isLiteralString(vartype) || this.types.isStruct(vartype)) {
            this.error(`Attribute '${structName}.${name}' cannot have the type '${this.types.describe(vartype)}'`, nameToken);
        }

        const symbol = this.addMemberSymbol(struct, members, nameToken);
        this.at(nameToken, () => this.symbols.declare(symbol, {
            type: SymbolType.Attribute,
            scope: ScopeType.None,
            vartype,
            qualifiers,
            section: nameToken.section,
            line: nameToken.line,
        }));

        const accessorQualifiers = qualifiers.clone().delete('attribute', 'readonly');
        this.declareAccessor(struct, `get_${name}`, [], vartype, accessorQualifiers, nameToken);
        if (!qualifiers.has('readonly')) {
            const value: ParamInfo = { name: null, vartype, isConst: false, defaultValue: null };
            this.declareAccessor(struct, `set_${name}`, [value], BuiltinType.Void, accessorQualifiers, nameToken);
        }
        members.push({ name, symbol, kind: 'attribute', vartype, offset: 0, qualifiers: qualifiers.clone() });
    }

    private declareAccessor(
        struct: Vartype,
        accessor: string,
        params: ParamInfo[],
        returnType: Vartype,
        qualifiers: TypeQualifierSet,
        at: ScannedSymbol,
    ): void {
        const qualified = `${this.types.struct(struct).name}::${accessor}`;
        const symbol = this.symbols.findOrAdd(qualified);
        this.at(at, () => this.symbols.declare(symbol, {
            type: SymbolType.Function,
            scope: ScopeType.Import,
            vartype: returnType,
            qualifiers,
            fn: {
                params,
                returnType,
                codeLoc: -1,
                pendingCalls: [],
                importIndex: this.ctx.imports.add(qualified, qualifiers.has('importtry')),
                ownerStruct: struct,
            },
            section: at.section,
            line: at.line,
        }));
    }

    // ========================================================================
    // Global Variables
    // ========================================================================

    private parseGlobalVariables(qualifiers: TypeQualifierSet, vartype: Vartype, first: ScannedSymbol): void {
        if (qualifiers.has('static')) {
            this.error("'static' can only be applied to functions", first);
        }
        let nameToken = first;
        for (;;) {
            this.declareGlobalVariable(qualifiers, vartype, nameToken);
            if (!this.accept(',')) break;
            nameToken = this.expectName('a variable name');
        }
        this.expect(';', 'after a global variable declaration');
    }

    private declareGlobalVariable(qualifiers: TypeQualifierSet, vartype: Vartype, nameToken: ScannedSymbol): void {
        const name = this.text(nameToken);
        const size = this.checkVariableType(vartype, `Declaring global variable '${name}'`, nameToken);
        const existing = this.entry(nameToken);
        if (existing.type === SymbolType.GlobalVar && existing.vartype !== vartype) {
            this.error(`'${name}' was declared before with the type '${this.types.describe(existing.vartype)}'`, nameToken);
        }

        if (qualifiers.isImport()) {
            if (this.is('=')) {
                this.error(`Imported variable '${name}' cannot have an initializer`);
            }
            // Importing a variable the unit already defines only confirms it
            const defined = existing.type === SymbolType.GlobalVar && existing.scope === ScopeType.Global;
            const offset = defined ? existing.offset : this.ctx.imports.add(name, qualifiers.has('importtry'));
            this.declare(nameToken, { type: SymbolType.GlobalVar, scope: ScopeType.Import, vartype, qualifiers, offset });
            return;
        }
        if (qualifiers.has('readonly')) {
            this.error("'readonly' can only be applied to imported variables", nameToken);
        }

        const offset = this.ctx.globals.allocate(size);
        if (this.accept('=')) {
            if (this.types.isStruct(vartype)) {
                this.error(`Struct variable '${name}' cannot have an initializer`, nameToken);
            }
            const cell = this.parseConstantValue(vartype, `the initializer of '${name}'`);
            this.ctx.globals.writeInt(offset, size, cell);
        } else if (qualifiers.has('const')) {
            this.error(`Constant '${name}' needs an initializer`, nameToken);
        }
        this.declare(nameToken, { type: SymbolType.GlobalVar, scope: ScopeType.Global, vartype, qualifiers, offset });
    }

    // ========================================================================
    // Functions
    // ========================================================================

    /**
     * Parameter list including its parentheses. Names are optional here;
     * function bodies require them.
     */
    private parseParameters(): ParamInfo[] {
        this.expect('(', 'to start the parameter list');
        const params: ParamInfo[] = [];
        if (this.is('void') && this.peekText() === ')') {
            this.advance();
        }
        if (this.accept(')')) return params;

        for (;;) {
            const start = this.current();
            const qualifiers = this.parseQualifiers('parameter');
            const vartype = this.parseType();
            const isConst = qualifiers.has('const');
            const types = this.types;

            if (types.isLiteralString(vartype)) {
                if (!isConst) {
                    this.error("The 'string' type can only be used for 'const string' parameters", start);
                }
            } else if (types.isVoid(vartype)) {
                this.error("A parameter cannot have the type 'void'", start);
            } else if (types.isStruct(vartype)) {
                this.error(`The struct '${types.describe(vartype)}' cannot be passed by value`, start);
            }

            const name = this.is(',') || this.is(')') || this.is('=')
                ? null
                : this.expectName('a parameter name').symbol;
            let defaultValue: number | null = null;
            if (this.accept('=')) {
                defaultValue = this.parseConstantValue(vartype, 'a default argument');
            } else if (params.some(p => p.defaultValue !== null)) {
                this.error(`Parameter ${params.length + 1} needs a default value, since an earlier one has one`, start);
            }
            params.push({ name, vartype, isConst, defaultValue });
            if (params.length > MAX_FUNCTION_PARAMETERS) {
                this.error(`A function can take at most ${MAX_FUNCTION_PARAMETERS} parameters`, start);
            }

            if (this.accept(')')) return params;
            this.expect(',', 'between parameters');
        }
    }

    private checkSignature(
        name: string,
        previous: FunctionInfo,
        params: readonly ParamInfo[],
        returnType: Vartype,
        at: Position,
    ): void {
        const same = previous.returnType === returnType
            && previous.params.length === params.length
            && params.every((p, i) => p.vartype === previous.params[i]?.vartype);
        if (!same) {
            this.error(`'${name}' was declared before with a different signature`, at);
        }
    }

    /**
     * Default values may be given once, on the prototype or the definition.
     */
    private mergeDefaults(params: ParamInfo[], previous: FunctionInfo | null): ParamInfo[] {
        if (previous === null) return params;
        return params.map((p, i) => ({
            ...p,
            defaultValue: p.defaultValue ?? previous.params[i]?.defaultValue ?? null,
        }));
    }

    private parseFunction(
        qualifiers: TypeQualifierSet,
        returnType: Vartype,
        nameToken: ScannedSymbol,
        noloopcheck: boolean,
    ): void {
        const name = this.text(nameToken);
        if (qualifiers.hasAny('const', 'readonly')) {
            this.error(`Function '${name}' cannot be 'const' or 'readonly'`, nameToken);
        }
        this.checkReturnType(returnType, name, nameToken);

        const existing = this.entry(nameToken);
        const previous = existing.type === SymbolType.Function ? existing.fn : null;
        const params = this.parseParameters();
        if (previous !== null) {
            this.checkSignature(name, previous, params, returnType, nameToken);
        }
        const isImport = qualifiers.isImport();
        const fn: FunctionInfo = {
            params: this.mergeDefaults(params, previous),
            returnType,
            codeLoc: -1,
            pendingCalls: previous?.pendingCalls ?? [],
            importIndex: -1,
            ownerStruct: null,
        };

        if (this.accept(';')) {
            if (noloopcheck) {
                this.error("'noloopcheck' needs a function body", nameToken);
            }
            if (isImport && previous !== null && previous.importIndex < 0 && previous.pendingCalls.length > 0) {
                this.error(`Function '${name}' is called as a local function before it is declared 'import'`, nameToken);
            }
            if (isImport && (previous === null || previous.codeLoc < 0)) {
                fn.importIndex = this.ctx.imports.add(name, qualifiers.has('importtry'));
            }
            this.declare(nameToken, {
                type: SymbolType.Function,
                scope: isImport ? ScopeType.Import : ScopeType.Global,
                vartype: returnType,
                qualifiers,
                fn,
            });
            return;
        }

        if (isImport) {
            this.error(`Imported function '${name}' cannot have a body`, nameToken);
        }
        if (previous !== null && previous.codeLoc >= 0) {
            this.error(`Function '${name}' is already defined`, nameToken);
        }
        const entry = this.declare(nameToken, {
            type: SymbolType.Function,
            scope: ScopeType.Global,
            vartype: returnType,
            qualifiers,
            fn,
        });
        if (noloopcheck) entry.flags.add('noloopcheck');
        this.compileFunctionBody(entry, fn, null, false, nameToken);
    }

    /**
     * `Type Struct::Name(params) { ... }`
     */
    private parseMemberFunctionDefinition(qualifiers: TypeQualifierSet, returnType: Vartype, noloopcheck: boolean): void {
        const structToken = this.advance();
        const structEntry = this.entry(structToken);
        const isStructName = (structEntry.type === SymbolType.Vartype || structEntry.type === SymbolType.UndefinedStruct)
            && this.types.isStruct(structEntry.vartype);
        if (!isStructName) {
            this.error(`'${structEntry.name}' is not a struct`, structToken);
        }
        const struct = structEntry.vartype;
        this.expect('::');

        const memberToken = this.advance();
        const memberName = this.text(memberToken);
        const qualified = `${structEntry.name}::${memberName}`;
        const member = this.at(memberToken, () => this.types.findMember(struct, memberName, `Defining '${qualified}'`));
        if (member === undefined || member.kind !== 'function') {
            this.error(`'${structEntry.name}' has no member function '${memberName}'`, memberToken);
        }
        const declared = this.symbols.get(member.symbol);
        const previous = declared.fn;
        if (previous === null) {
            throw new InternalError(`Member function '${qualified}' has no function info`);
        }

        const params = this.parseParameters();
        this.checkSignature(qualified, previous, params, returnType, memberToken);
        if (previous.codeLoc >= 0) {
            this.error(`Function '${qualified}' is already defined`, memberToken);
        }
        if (qualifiers.isImport()) {
            this.error(`Imported function '${qualified}' cannot have a body`, memberToken);
        }
        const isStatic = declared.qualifiers.has('static');
        if (qualifiers.has('static') && !isStatic) {
            this.error(`'${qualified}' is not declared 'static' in its struct`, memberToken);
        }

        const fn: FunctionInfo = {
            params: this.mergeDefaults(params, previous),
            returnType,
            codeLoc: -1,
            pendingCalls: previous.pendingCalls,
            importIndex: -1,
            ownerStruct: struct,
        };
        const entry = this.at(memberToken, () => this.symbols.declare(member.symbol, {
            type: SymbolType.Function,
            scope: ScopeType.Global,
            vartype: returnType,
            qualifiers: declared.qualifiers.clone().delete('importstd', 'importtry'),
            fn,
            section: memberToken.section,
            line: memberToken.line,
        }));
        if (noloopcheck) entry.flags.add('noloopcheck');
        this.compileFunctionBody(entry, fn, struct, isStatic, memberToken);
    }

    /**
     * Emit a function body. Parameters sit below the return address;
     * pointer parameters take a reference on entry.
     */
    private compileFunctionBody(
        entry: SymbolEntry,
        fn: FunctionInfo,
        ownerStruct: Vartype | null,
        isStatic: boolean,
        nameToken: ScannedSymbol,
    ): void {
        fn.params.forEach((param, i) => {
            if (param.name === null) {
                this.error(`Parameter ${i + 1} of '${entry.name}' needs a name`, nameToken);
            }
        });
        const open = this.expect('{', `to start the body of '${entry.name}'`);
        const code = this.ctx.code;

        this.ctx.markSection(open.section);
        fn.codeLoc = code.code.length;
        for (const call of fn.pendingCalls) {
            patchCell(code, call.loc, fn.codeLoc);
        }
        fn.pendingCalls = [];
        code.depth = 0;

        this.ctx.fn = { symbol: entry.id, name: entry.name, info: fn, ownerStruct, isStatic, scopes: [], loops: [] };
        this.ctx.openScope();

        fn.params.forEach((param, i) => {
            const name = param.name;
            if (name === null) return;
            const position = -(2 + i) * Sizes.STACK_CELL;
            this.at(nameToken, () => this.symbols.declare(name, {
                type: SymbolType.LocalVar,
                scope: ScopeType.Local,
                vartype: param.vartype,
                qualifiers: param.isConst ? TypeQualifierSet.of('const') : undefined,
                offset: position,
                section: nameToken.section,
                line: nameToken.line,
            }));
            if (this.types.isPointer(param.vartype)) {
                loadFrameAddress(code, position);
                emit(code, Opcode.MEMREAD, Register.AX);
                emit(code, Opcode.MEMINITPTR, Register.AX);
                this.ctx.addPointerSlot(position);
            }
        });
        if (entry.flags.has('noloopcheck')) {
            emit(code, Opcode.LOOPCHECKOFF);
        }

        while (!this.accept('}')) {
            if (this.isAtEnd()) {
                this.error(`The body of '${entry.name}' is not closed`, open);
            }
            this.parseStatement();
        }

        this.ctx.closeScope();
        emit(code, Opcode.LITTOREG, Register.AX, 0);
        emit(code, Opcode.RET);
        if (code.depth !== 0) {
            throw new InternalError(`Stack depth ${code.depth} at the end of '${entry.name}'`);
        }
        this.ctx.fn = null;
        this.ctx.log(`function ${entry.name}: ${code.code.length - fn.codeLoc} cells at ${fn.codeLoc}`);
    }

    private checkUndefinedFunctions(): void {
        for (const entry of this.symbols.all()) {
            const fn = entry.fn;
            if (entry.type !== SymbolType.Function || fn === null || fn.codeLoc >= 0) continue;
            const call = fn.pendingCalls[0];
            if (call !== undefined) {
                throw new UserError(`Function '${entry.name}' is called but never defined`, call.section, call.line);
            }
        }
    }

    // ========================================================================
    // Statements
    // ========================================================================

    private parseStatement(): void {
        const token = this.current();
        emitLineNumber(this.ctx.code, token.line);

        switch (this.text(token)) {
            case '{':
                this.parseBlock();
                return;
            case ';':
                this.advance();
                return;
            case 'if':
                this.parseIf();
                return;
            case 'while':
                this.parseWhile();
                return;
            case 'do':
                this.parseDoWhile();
                return;
            case 'for':
                this.parseFor();
                return;
            case 'switch':
                this.parseSwitch();
                return;
            case 'break':
                this.parseBreak();
                return;
            case 'continue':
                this.parseContinue();
                return;
            case 'return':
                this.parseReturn();
                return;
            case 'case':
            case 'default':
                this.error(`'${this.text(token)}' outside of a switch`);
        }

        if (this.isDeclarationStart()) {
            this.parseLocalDeclaration();
            return;
        }
        const statement = this.parseSimpleStatement();
        this.expect(';', 'after a statement');
        this.at(statement, () => emitSimpleStatement(this.ctx, statement));
    }

    private isDeclarationStart(): boolean {
        if (qualifierOf(this.text()) !== undefined) return true;
        const type = this.entry().type;
        if (type !== SymbolType.Vartype && type !== SymbolType.UndefinedStruct) return false;
        // `Struct.member` starts an expression
        return this.peekText() !== '.';
    }

    private parseBlock(): void {
        const open = this.expect('{');
        this.ctx.openScope();
        while (!this.accept('}')) {
            if (this.isAtEnd()) {
                this.error("Block is not closed: expected '}'", open);
            }
            this.parseStatement();
        }
        this.ctx.closeScope();
    }

    /**
     * The statement controlled by if/else/while/do/for, in a scope of its own.
     */
    private parseControlled(): void {
        this.ctx.openScope();
        this.parseStatement();
        this.ctx.closeScope();
    }

    private parseCondition(): void {
        this.expect('(', 'before the condition');
        const condition = this.parseExpression();
        this.expect(')', 'after the condition');
        this.at(condition, () => emitCondition(this.ctx, condition));
    }

    private parseLocalDeclaration(): void {
        const qualifiers = this.parseQualifiers('local');
        const vartype = this.parseType();
        do {
            this.declareLocalVariable(qualifiers, vartype, this.expectName('a variable name'));
        } while (this.accept(','));
        this.expect(';', 'after a local variable declaration');
    }

    private declareLocalVariable(qualifiers: TypeQualifierSet, vartype: Vartype, nameToken: ScannedSymbol): void {
        const name = this.text(nameToken);
        const code = this.ctx.code;
        const size = this.checkVariableType(vartype, `Declaring local variable '${name}'`, nameToken);
        const slot = alignTo(size, Sizes.STACK_CELL);
        const position = code.depth;

        if (this.accept('=')) {
            if (this.types.isStruct(vartype)) {
                this.error(`Struct variable '${name}' cannot have an initializer`, nameToken);
            }
            const value = this.parseExpression();
            this.at(value, () => {
                emitConverted(this.ctx, value, vartype, `the initialization of '${name}'`);
                loadFrameAddress(code, position);
                emit(code, this.initOpcode(vartype, size), Register.AX);
            });
        } else {
            if (qualifiers.has('const')) {
                this.error(`Constant '${name}' needs an initializer`, nameToken);
            }
            loadFrameAddress(code, position);
            emit(code, Opcode.ZEROMEMORY, slot);
        }
        growStack(code, slot);

        this.declare(nameToken, { type: SymbolType.LocalVar, scope: ScopeType.Local, vartype, qualifiers, offset: position });
        if (this.types.isPointer(vartype)) {
            this.ctx.addPointerSlot(position);
        }
    }

    private initOpcode(vartype: Vartype, size: number): OpcodeValue {
        if (this.types.isPointer(vartype)) return Opcode.MEMINITPTR;
        if (size === 1) return Opcode.MEMWRITEB;
        if (size === 2) return Opcode.MEMWRITEW;
        return Opcode.MEMWRITE;
    }

    private parseIf(): void {
        this.advance();
        this.parseCondition();
        const code = this.ctx.code;
        const otherwise = newLabel();
        emitJump(code, Opcode.JZ, otherwise);
        this.parseControlled();

        if (this.accept('else')) {
            const end = newLabel();
            emitJump(code, Opcode.JMP, end);
            placeLabel(code, otherwise);
            this.parseControlled();
            placeLabel(code, end);
        } else {
            placeLabel(code, otherwise);
        }
    }

    private parseWhile(): void {
        this.advance();
        const code = this.ctx.code;
        const top = newLabel();
        const end = newLabel();
        placeLabel(code, top);
        this.parseCondition();
        emitJump(code, Opcode.JZ, end);

        this.parseLoopBody(end, top);
        emitJump(code, Opcode.JMP, top);
        placeLabel(code, end);
    }

    private parseDoWhile(): void {
        this.advance();
        const code = this.ctx.code;
        const top = newLabel();
        const next = newLabel();
        const end = newLabel();
        placeLabel(code, top);

        this.parseLoopBody(end, next);
        placeLabel(code, next);
        this.expect('while', "after the body of 'do'");
        this.parseCondition();
        emitJump(code, Opcode.JNZ, top);
        placeLabel(code, end);
        this.expect(';', "after 'do ... while (...)'");
    }

    private parseFor(): void {
        this.advance();
        const code = this.ctx.code;
        this.expect('(', "after 'for'");
        this.ctx.openScope();

        if (!this.accept(';')) {
            if (this.isDeclarationStart()) {
                this.parseLocalDeclaration();
            } else {
                const init = this.parseSimpleStatement();
                this.expect(';', "after the initialization of 'for'");
                this.at(init, () => emitSimpleStatement(this.ctx, init));
            }
        }

        const top = newLabel();
        const next = newLabel();
        const end = newLabel();
        placeLabel(code, top);
        if (!this.accept(';')) {
            const condition = this.parseExpression();
            this.expect(';', "after the condition of 'for'");
            this.at(condition, () => emitCondition(this.ctx, condition));
            emitJump(code, Opcode.JZ, end);
        }

        // The increment is parsed now and emitted after the body
        let increment: SimpleStatement | null = null;
        if (!this.is(')')) {
            increment = this.parseSimpleStatement();
        }
        this.expect(')', "after the head of 'for'");

        this.parseLoopBody(end, next);
        placeLabel(code, next);
        if (increment !== null) {
            const statement = increment;
            this.at(statement, () => emitSimpleStatement(this.ctx, statement));
        }
        emitJump(code, Opcode.JMP, top);
        placeLabel(code, end);
        this.ctx.closeScope();
    }

    private parseLoopBody(breakLabel: Label, continueLabel: Label): void {
        const fn = this.ctx.currentFunction();
        fn.loops.push({ breakLabel, continueLabel, depth: this.ctx.code.depth, scopeCount: fn.scopes.length });
        this.parseControlled();
        fn.loops.pop();
    }

    /**
     * The switch value stays pushed while the cases run; the tests are
     * emitted after the body and jump back to the case labels.
     */
    private parseSwitch(): void {
        const start = this.advance();
        const code = this.ctx.code;
        const fn = this.ctx.currentFunction();

        this.expect('(', "after 'switch'");
        const value = this.parseExpression();
        this.expect(')', "after the switch value");
        const valueType = this.at(value, () => emitExpression(this.ctx, value));
        if (!this.types.isInteger(valueType)) {
            this.error(`Cannot switch on a value of type '${this.types.describe(valueType)}'`, value);
        }
        const position = code.depth;
        pushReg(code, Register.AX);

        const tests = newLabel();
        const end = newLabel();
        emitJump(code, Opcode.JMP, tests);

        const cases: { label: Label; value: Expression }[] = [];
        let defaultLabel: Label | null = null;
        fn.loops.push({ breakLabel: end, continueLabel: null, depth: code.depth, scopeCount: fn.scopes.length });

        this.expect('{', "to start the body of 'switch'");
        while (!this.accept('}')) {
            if (this.isAtEnd()) {
                this.error("The body of 'switch' is not closed", start);
            }
            if (this.accept('case')) {
                const caseValue = this.parseExpression();
                this.expect(':', 'after a case value');
                const label = newLabel();
                placeLabel(code, label);
                cases.push({ label, value: caseValue });
            } else if (this.is('default')) {
                if (defaultLabel !== null) {
                    this.error("A switch can only have one 'default'");
                }
                this.advance();
                this.expect(':', "after 'default'");
                defaultLabel = newLabel();
                placeLabel(code, defaultLabel);
            } else if (cases.length === 0 && defaultLabel === null) {
                this.error(`Expected 'case' or 'default', found ${this.describe()}`);
            } else if (this.isDeclarationStart()) {
                this.error('Local variables in a switch must be declared inside a block');
            } else {
                this.parseStatement();
            }
        }
        fn.loops.pop();
        emitJump(code, Opcode.JMP, end);

        placeLabel(code, tests);
        for (const entry of cases) {
            this.at(entry.value, () => {
                const caseType = emitExpression(this.ctx, entry.value);
                if (!this.types.isInteger(caseType)) {
                    this.error(`A case value must be an integer, not '${this.types.describe(caseType)}'`, entry.value);
                }
            });
            emit(code, Opcode.REGTOREG, Register.AX, Register.BX);
            loadFrameAddress(code, position);
            emit(code, Opcode.MEMREAD, Register.AX);
            emit(code, Opcode.ISEQUAL, Register.AX, Register.BX);
            emitJump(code, Opcode.JNZ, entry.label);
        }
        emitJump(code, Opcode.JMP, defaultLabel ?? end);
        placeLabel(code, end);
        shrinkStack(code, Sizes.STACK_CELL);
    }

    private parseBreak(): void {
        const token = this.advance();
        const loops = this.ctx.currentFunction().loops;
        const loop = loops[loops.length - 1];
        if (loop === undefined) {
            this.error("'break' outside of a loop or switch", token);
        }
        this.ctx.unwindScopes(loop.scopeCount, false);
        emitJump(this.ctx.code, Opcode.JMP, loop.breakLabel, loop.depth);
        this.expect(';', "after 'break'");
    }

    private parseContinue(): void {
        const token = this.advance();
        const loops = this.ctx.currentFunction().loops;
        const loop = [...loops].reverse().find(l => l.continueLabel !== null);
        if (loop === undefined || loop.continueLabel === null) {
            this.error("'continue' outside of a loop", token);
        }
        this.ctx.unwindScopes(loop.scopeCount, false);
        emitJump(this.ctx.code, Opcode.JMP, loop.continueLabel, loop.depth);
        this.expect(';', "after 'continue'");
    }

    private parseReturn(): void {
        const token = this.advance();
        const fn = this.ctx.currentFunction();
        const returnType = fn.info.returnType;
        const code = this.ctx.code;

        if (!this.is(';')) {
            if (this.types.isVoid(returnType)) {
                this.error(`'${fn.name}' returns void and cannot return a value`, token);
            }
            const value = this.parseExpression();
            this.at(value, () => emitConverted(this.ctx, value, returnType, `the return value of '${fn.name}'`));
        } else {
            emit(code, Opcode.LITTOREG, Register.AX, 0);
        }
        this.expect(';', "after 'return'");
        this.ctx.unwindScopes(0, true);
        emit(code, Opcode.RET);
    }

    /**
     * Assignment, modifying assignment, `++`/`--` or call.
     */
    private parseSimpleStatement(): SimpleStatement {
        const start = this.current();
        const startText = this.text(start);
        if (startText === '++' || startText === '--') {
            this.advance();
            const target = this.parsePostfix();
            return { kind: 'IncDec', operator: startText, target, line: start.line, section: start.section };
        }

        const target = this.parsePostfix();
        const token = this.current();
        const text = this.text(token);
        const position = { line: token.line, section: token.section };

        if (text === '++' || text === '--') {
            this.advance();
            return { kind: 'IncDec', operator: text, target, ...position };
        }
        if (text === '=') {
            this.advance();
            return { kind: 'Assign', operator: null, target, value: this.parseExpression(), ...position };
        }
        if (this.entry(token).type === SymbolType.AssignMod) {
            const operator = text.slice(0, -1);
            if (!isModifyOperator(operator)) {
                throw new InternalError(`Unknown modifying assignment '${text}'`);
            }
            this.advance();
            return { kind: 'Assign', operator, target, value: this.parseExpression(), ...position };
        }
        if (target.kind === 'Call') {
            return { kind: 'CallStatement', call: target, line: start.line, section: start.section };
        }
        this.error(`Expected an assignment or a function call, found ${this.describe(token)}`);
    }

    // ========================================================================
    // Expressions
    // ========================================================================

    private parseExpression(): Expression {
        const condition = this.parseBinary(1);
        const token = this.current();
        if (!this.accept('?')) return condition;

        const whenTrue = this.parseExpression();
        this.expect(':', "in '?:'");
        const whenFalse = this.parseExpression();
        return { kind: 'Ternary', condition, whenTrue, whenFalse, line: token.line, section: token.section };
    }

    private parseBinary(minPrecedence: number): Expression {
        let left = this.parseUnary();
        for (;;) {
            const token = this.current();
            const operator = this.text(token);
            if (this.entry(token).type !== SymbolType.Operator || !isBinaryOperator(operator)) return left;
            const precedence = PRECEDENCE[operator];
            if (precedence < minPrecedence) return left;

            this.advance();
            const right = this.parseBinary(precedence + 1);
            left = { kind: 'Binary', operator, left, right, line: token.line, section: token.section };
        }
    }

    private parseUnary(): Expression {
        const token = this.current();
        const position = { line: token.line, section: token.section };

        if (this.accept('-')) {
            return { kind: 'Unary', operator: '-', operand: this.parseUnary(), ...position };
        }
        if (this.accept('!')) {
            return { kind: 'Unary', operator: '!', operand: this.parseUnary(), ...position };
        }
        if (this.accept('new')) {
            const typeToken = this.current();
            const entry = this.entry(typeToken);
            const isStructName = (entry.type === SymbolType.Vartype || entry.type === SymbolType.UndefinedStruct)
                && this.types.isStruct(entry.vartype);
            if (!isStructName) {
                this.error(`Expected a struct name after 'new', found ${this.describe(typeToken)}`);
            }
            this.advance();
            return { kind: 'New', vartype: entry.vartype, ...position };
        }
        return this.parsePostfix();
    }

    private parsePostfix(): Expression {
        let expr = this.parsePrimary();
        for (;;) {
            const token = this.current();
            const position = { line: token.line, section: token.section };
            if (this.accept('.')) {
                const member = this.expectMemberName();
                expr = { kind: 'Member', object: expr, staticType: null, member, ...position };
            } else if (this.is('(')) {
                expr = this.parseCall(expr);
            } else {
                return expr;
            }
        }
    }

    private parseCall(callee: Expression): CallExpr {
        const open = this.advance();
        const args: Expression[] = [];
        if (!this.accept(')')) {
            do {
                args.push(this.parseExpression());
            } while (this.accept(','));
            this.expect(')', 'after the arguments');
        }
        return { kind: 'Call', callee, args, line: open.line, section: open.section };
    }

    private expectMemberName(): string {
        const token = this.current();
        const name = this.text(token);
        if (token.symbol === this.symbols.endOfInput || !IDENTIFIER.test(name)) {
            this.error(`Expected a member name, found ${this.describe(token)}`);
        }
        this.advance();
        return name;
    }

    private parsePrimary(): Expression {
        const token = this.current();
        const entry = this.entry(token);
        const position = { line: token.line, section: token.section };

        if (this.accept('(')) {
            const inner = this.parseExpression();
            this.expect(')', 'to close the parenthesis');
            return inner;
        }

        // `Struct.member` is a static access
        if ((entry.type === SymbolType.Vartype || entry.type === SymbolType.UndefinedStruct) && this.peekText() === '.') {
            if (!this.types.isStruct(entry.vartype)) {
                this.error(`'${entry.name}' has no members`);
            }
            this.advance();
            this.advance();
            const member = this.expectMemberName();
            return { kind: 'Member', object: null, staticType: entry.vartype, member, ...position };
        }

        switch (entry.type) {
            case SymbolType.NoType:
                this.error(`Undefined identifier '${entry.name}'`);
            case SymbolType.Delimiter:
            case SymbolType.Operator:
                this.error(`Expected an expression, found ${this.describe(token)}`);
            default:
                if (entry.type >= SymbolType.StructComponent) {
                    this.error(`'${entry.name}' is ${describeSymbolType(entry.type)} and cannot be used in an expression`);
                }
        }
        this.advance();
        return { kind: 'Name', symbol: token.symbol, ...position };
    }
}
