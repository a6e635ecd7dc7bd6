/**
 * gscript Expression Emitter
 *
 * SPDX-License-Identifier: MIT
 *
 * Checks expression trees and simple statements and emits their code.
 * Every expression leaves its value in AX.
 *
 * Binary operators evaluate as
 *   <left>; PUSHREG AX; <right>; REGTOREG AX, BX; POPREG AX; <op> AX, BX
 */

import { SymbolType, ScopeType, describeSymbolType } from './types.ts';
import type { Vartype } from './types.ts';
import type { SymbolEntry } from './symbol-table.ts';
import { BuiltinType } from './type-registry.ts';
import type { StructMember, StructType } from './type-registry.ts';
import { UserError } from './errors.ts';
import {
    emit,
    emitRelocated,
    emitJump,
    newLabel,
    placeLabel,
    pushReg,
    popReg,
    shrinkStack,
    loadFrameAddress,
    floatToCell,
} from './codegen.ts';
import type { CompilationContext } from './context.ts';
import type {
    ASTNode,
    Expression,
    NameExpr,
    MemberExpr,
    CallExpr,
    UnaryExpr,
    BinaryExpr,
    BinaryOperator,
    TernaryExpr,
    NewExpr,
    AssignStatement,
    IncDecStatement,
    SimpleStatement,
    ModifyOperator,
} from './ast.ts';
import { Opcode, Register } from '../module/opcodes.ts';
import type { OpcodeValue } from '../module/opcodes.ts';
import { FixupType } from '../module/types.ts';

// ============================================================================
// Access Paths
// ============================================================================

/**
 * Where the base address of an object comes from.
 */
type ObjectRef =
    /** A pointer-valued expression */
    | { kind: 'pointer'; expr: Expression }
    /** The object of the member function being compiled, held in OP */
    | { kind: 'this' }
    /** A non-managed struct variable */
    | { kind: 'value'; access: Access };

/**
 * A storage location an expression denotes.
 */
type Access =
    | { kind: 'local'; entry: SymbolEntry; vartype: Vartype }
    | { kind: 'global'; entry: SymbolEntry; vartype: Vartype }
    | { kind: 'import'; entry: SymbolEntry; vartype: Vartype }
    | { kind: 'this'; vartype: Vartype }
    | { kind: 'field'; base: ObjectRef; member: StructMember; vartype: Vartype; viaThis: boolean }
    | { kind: 'attribute'; base: ObjectRef | null; struct: StructType; member: StructMember; vartype: Vartype };

/**
 * A resolved `object.member` or `Struct.member`.
 */
interface MemberTarget {
    struct: StructType;
    member: StructMember;
    /** null for static access */
    base: ObjectRef | null;
    viaThis: boolean;
}

function fail(node: ASTNode, message: string): never {
    throw new UserError(message, node.section, node.line);
}

// ============================================================================
// Resolution (no code emitted)
// ============================================================================

/**
 * Owner struct of `this`, or a user error when there is none.
 */
function requireThis(ctx: CompilationContext, node: ASTNode): Vartype {
    const fn = ctx.fn;
    if (fn === null || fn.ownerStruct === null) {
        fail(node, "'this' can only be used inside member functions");
    }
    if (fn.isStatic) {
        fail(node, "'this' cannot be used in a static member function");
    }
    return fn.ownerStruct;
}

function isThis(ctx: CompilationContext, expr: Expression): boolean {
    return expr.kind === 'Name' && ctx.symbols.name(expr.symbol) === 'this';
}

function resolveAccess(ctx: CompilationContext, expr: Expression): Access | null {
    if (expr.kind === 'Name') {
        if (isThis(ctx, expr)) {
            return { kind: 'this', vartype: requireThis(ctx, expr) };
        }
        const entry = ctx.symbols.get(expr.symbol);
        if (entry.type === SymbolType.LocalVar) {
            return { kind: 'local', entry, vartype: entry.vartype };
        }
        if (entry.type === SymbolType.GlobalVar) {
            return entry.scope === ScopeType.Import
                ? { kind: 'import', entry, vartype: entry.vartype }
                : { kind: 'global', entry, vartype: entry.vartype };
        }
        return null;
    }

    if (expr.kind === 'Member') {
        const target = resolveMember(ctx, expr);
        if (target.member.kind === 'field') {
            if (target.base === null) {
                fail(expr, `'${target.struct.name}.${expr.member}' is not static and needs an object`);
            }
            return {
                kind: 'field',
                base: target.base,
                member: target.member,
                vartype: target.member.vartype,
                viaThis: target.viaThis,
            };
        }
        if (target.member.kind === 'attribute') {
            return {
                kind: 'attribute',
                base: target.base,
                struct: target.struct,
                member: target.member,
                vartype: target.member.vartype,
            };
        }
    }
    return null;
}

function objectRef(ctx: CompilationContext, object: Expression): { ref: ObjectRef; struct: Vartype } {
    if (isThis(ctx, object)) {
        return { ref: { kind: 'this' }, struct: requireThis(ctx, object) };
    }
    const access = resolveAccess(ctx, object);
    if (access !== null && access.kind !== 'attribute' && ctx.types.isStruct(access.vartype)) {
        return { ref: { kind: 'value', access }, struct: access.vartype };
    }
    const vartype = typeOf(ctx, object);
    if (ctx.types.isPointer(vartype)) {
        return { ref: { kind: 'pointer', expr: object }, struct: ctx.types.pointerTarget(vartype) };
    }
    fail(object, `A value of type '${ctx.types.describe(vartype)}' has no members`);
}

function resolveMember(ctx: CompilationContext, expr: MemberExpr): MemberTarget {
    let structType: Vartype;
    let base: ObjectRef | null = null;

    if (expr.object === null) {
        if (expr.staticType === null) {
            fail(expr, `Member access '.${expr.member}' without an object`);
        }
        structType = expr.staticType;
    } else {
        const resolved = objectRef(ctx, expr.object);
        structType = resolved.struct;
        base = resolved.ref;
    }

    const struct = ctx.types.struct(structType);
    const member = ctx.types.findMember(structType, expr.member, `Accessing '${struct.name}.${expr.member}'`);
    if (member === undefined) {
        fail(expr, `'${struct.name}' has no member named '${expr.member}'`);
    }
    if (base === null && !member.qualifiers.has('static')) {
        fail(expr, `'${struct.name}.${expr.member}' is not static and needs an object`);
    }
    const viaThis = base !== null && base.kind === 'this';
    if (member.qualifiers.has('protected') && !viaThis) {
        fail(expr, `'${struct.name}::${member.name}' is protected and can only be accessed through 'this'`);
    }
    return { struct, member, base, viaThis };
}

/**
 * Static type of an expression, without emitting code.
 */
export function typeOf(ctx: CompilationContext, expr: Expression): Vartype {
    switch (expr.kind) {
        case 'Name': {
            if (isThis(ctx, expr)) {
                const owner = requireThis(ctx, expr);
                return ctx.types.hasStructQualifier(owner, 'managed') ? ctx.types.pointerTo(owner) : owner;
            }
            const entry = ctx.symbols.get(expr.symbol);
            if (entry.type === SymbolType.NoType) {
                fail(expr, `Undefined identifier '${entry.name}'`);
            }
            if (entry.type === SymbolType.Function && entry.fn !== null) {
                return entry.fn.returnType;
            }
            return entry.vartype;
        }
        case 'Member':
            return resolveMember(ctx, expr).member.vartype;
        case 'Call':
            return typeOf(ctx, expr.callee);
        case 'Unary':
            return expr.operator === '!' ? BuiltinType.Bool : typeOf(ctx, expr.operand);
        case 'Binary':
            if (isComparison(expr.operator) || expr.operator === '&&' || expr.operator === '||') {
                return BuiltinType.Bool;
            }
            return ctx.types.isFloat(typeOf(ctx, expr.left)) ? BuiltinType.Float : BuiltinType.Int;
        case 'Ternary': {
            const vartype = typeOf(ctx, expr.whenTrue);
            return ctx.types.isNull(vartype) ? typeOf(ctx, expr.whenFalse) : vartype;
        }
        case 'New':
            return ctx.types.pointerTo(expr.vartype);
    }
}

// ============================================================================
// Addressing
// ============================================================================

/**
 * True when computing the address of `access` overwrites AX.
 */
function clobbersAx(access: Access): boolean {
    switch (access.kind) {
        case 'field':
            if (access.base.kind === 'pointer') return true;
            return access.base.kind === 'value' && clobbersAx(access.base.access);
        case 'attribute':
            return true;
        default:
            return false;
    }
}

/**
 * Put the base address of an object into MAR.
 */
function loadObjectAddress(ctx: CompilationContext, ref: ObjectRef): void {
    switch (ref.kind) {
        case 'this':
            emit(ctx.code, Opcode.REGTOREG, Register.OP, Register.MAR);
            break;
        case 'pointer':
            emitExpression(ctx, ref.expr);
            emit(ctx.code, Opcode.REGTOREG, Register.AX, Register.MAR);
            emit(ctx.code, Opcode.CHECKNULL);
            break;
        case 'value':
            markRead(ref.access);
            loadAddress(ctx, ref.access);
            break;
    }
}

/**
 * Put the address of a storage location into MAR.
 */
function loadAddress(ctx: CompilationContext, access: Access): void {
    switch (access.kind) {
        case 'local':
            loadFrameAddress(ctx.code, access.entry.offset);
            break;
        case 'global':
            emitRelocated(ctx.code, Register.MAR, access.entry.offset, FixupType.GlobalData);
            break;
        case 'import':
            emitRelocated(ctx.code, Register.MAR, access.entry.offset, FixupType.Import);
            break;
        case 'this':
            emit(ctx.code, Opcode.REGTOREG, Register.OP, Register.MAR);
            break;
        case 'field':
            loadObjectAddress(ctx, access.base);
            if (access.member.offset !== 0) {
                emit(ctx.code, Opcode.ADD, Register.MAR, access.member.offset);
            }
            break;
        case 'attribute':
            throw new UserError(`Attribute '${access.member.name}' has no address`);
    }
}

function markRead(access: Access): void {
    if (access.kind === 'local' || access.kind === 'global' || access.kind === 'import') {
        access.entry.flags.add('accessed');
    }
}

function readOpcode(ctx: CompilationContext, node: ASTNode, vartype: Vartype): OpcodeValue {
    if (ctx.types.isPointer(vartype)) return Opcode.MEMREADPTR;
    if (ctx.types.isStruct(vartype)) {
        fail(node, `A value of struct type '${ctx.types.describe(vartype)}' cannot be used in an expression`);
    }
    switch (ctx.types.sizeOf(vartype)) {
        case 1: return Opcode.MEMREADB;
        case 2: return Opcode.MEMREADW;
        default: return Opcode.MEMREAD;
    }
}

function writeOpcode(ctx: CompilationContext, node: ASTNode, vartype: Vartype): OpcodeValue {
    if (ctx.types.isPointer(vartype)) return Opcode.MEMWRITEPTR;
    if (ctx.types.isStruct(vartype)) {
        fail(node, `Cannot assign or pass a value of struct type '${ctx.types.describe(vartype)}'`);
    }
    switch (ctx.types.sizeOf(vartype)) {
        case 1: return Opcode.MEMWRITEB;
        case 2: return Opcode.MEMWRITEW;
        default: return Opcode.MEMWRITE;
    }
}

/**
 * Read the value at `access` into AX.
 */
function emitRead(ctx: CompilationContext, node: ASTNode, access: Access): Vartype {
    if (access.kind === 'attribute') {
        emitAttributeGet(ctx, node, access);
        return access.vartype;
    }
    if (access.kind === 'this') {
        if (!ctx.types.hasStructQualifier(access.vartype, 'managed')) {
            fail(node, `'this' of the non-managed struct '${ctx.types.describe(access.vartype)}' cannot be used as a value`);
        }
        emit(ctx.code, Opcode.REGTOREG, Register.OP, Register.AX);
        return ctx.types.pointerTo(access.vartype);
    }
    const opcode = readOpcode(ctx, node, access.vartype);
    markRead(access);
    loadAddress(ctx, access);
    emit(ctx.code, opcode, Register.AX);
    return access.vartype;
}

/**
 * Store AX at `access`. Computes the address without losing AX.
 */
function emitWrite(ctx: CompilationContext, node: ASTNode, access: Access): void {
    if (access.kind === 'attribute') {
        emitAttributeSet(ctx, node, access);
        return;
    }
    const opcode = writeOpcode(ctx, node, access.vartype);
    if (clobbersAx(access)) {
        pushReg(ctx.code, Register.AX);
        loadAddress(ctx, access);
        popReg(ctx.code, Register.AX);
    } else {
        loadAddress(ctx, access);
    }
    emit(ctx.code, opcode, Register.AX);
}

// ============================================================================
// Attributes
// ============================================================================

function accessor(ctx: CompilationContext, node: ASTNode, struct: StructType, name: string): SymbolEntry {
    const symbol = ctx.symbols.find(`${struct.name}::${name}`);
    const entry = symbol === undefined ? undefined : ctx.symbols.get(symbol);
    if (entry === undefined || entry.fn === null) {
        fail(node, `Accessor '${struct.name}::${name}' is not declared`);
    }
    return entry;
}

/**
 * Call an imported accessor whose arguments are already pushed.
 */
function emitAccessorCall(ctx: CompilationContext, entry: SymbolEntry, base: ObjectRef | null, argCount: number): void {
    if (base !== null) {
        loadObjectAddress(ctx, base);
        emit(ctx.code, Opcode.CALLOBJ, Register.MAR);
    }
    emit(ctx.code, Opcode.NUMFUNCARGS, argCount);
    emitRelocated(ctx.code, Register.AX, entry.fn?.importIndex ?? 0, FixupType.Import);
    emit(ctx.code, Opcode.CALLEXT, Register.AX);
    if (argCount > 0) {
        emit(ctx.code, Opcode.SUBREALSTACK, argCount);
    }
    entry.flags.add('accessed');
}

function emitAttributeGet(ctx: CompilationContext, node: ASTNode, access: Extract<Access, { kind: 'attribute' }>): void {
    const getter = accessor(ctx, node, access.struct, `get_${access.member.name}`);
    emitAccessorCall(ctx, getter, access.base, 0);
}

function emitAttributeSet(ctx: CompilationContext, node: ASTNode, access: Extract<Access, { kind: 'attribute' }>): void {
    const setter = accessor(ctx, node, access.struct, `set_${access.member.name}`);
    emit(ctx.code, Opcode.PUSHREAL, Register.AX);
    emitAccessorCall(ctx, setter, access.base, 1);
}

// ============================================================================
// Type Conversion
// ============================================================================

/**
 * Check that a value of type `from` in AX may be used as `to`, converting
 * string literals to string objects.
 */
export function convertValue(
    ctx: CompilationContext,
    node: ASTNode,
    from: Vartype,
    to: Vartype,
    what: string,
): void {
    const types = ctx.types;
    const fromName = types.describe(from);
    const toName = types.describe(to);

    if (types.isVoid(from)) {
        fail(node, `A void value cannot be used in ${what}`);
    }
    if (from === to) return;
    if (types.isInteger(from) && types.isInteger(to)) return;
    if (types.isNull(from) && types.isPointer(to)) return;
    if (types.isLiteralString(from)) {
        if (types.isStringPointer(to)) {
            emit(ctx.code, Opcode.CREATESTRING, Register.AX);
            return;
        }
        if (types.isLiteralString(to)) return;
    }
    if (types.isStringPointer(from) && types.isLiteralString(to)) return;

    if (types.isStruct(from) || types.isStruct(to)) {
        fail(node, `Cannot assign or pass a value of struct type '${types.isStruct(from) ? fromName : toName}'`);
    }
    if (types.isManagedValue(from) && !types.isManagedValue(to)) {
        fail(node, `Type mismatch: cannot assign managed value of type '${fromName}' to non-managed target of type '${toName}' in ${what}`);
    }
    fail(node, `Type mismatch: cannot convert '${fromName}' to '${toName}' in ${what}`);
}

/**
 * Emit `expr` and convert the value to `to`.
 */
export function emitConverted(ctx: CompilationContext, expr: Expression, to: Vartype, what: string): void {
    const from = emitExpression(ctx, expr);
    convertValue(ctx, expr, from, to, what);
}

/**
 * Emit a condition: an integer or a pointer value.
 */
export function emitCondition(ctx: CompilationContext, expr: Expression): void {
    const vartype = emitExpression(ctx, expr);
    if (!ctx.types.isInteger(vartype) && !ctx.types.isManagedValue(vartype)) {
        fail(expr, `A condition must be an integer or a pointer, not '${ctx.types.describe(vartype)}'`);
    }
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Emit `expr`; its value ends up in AX. Returns the value's type.
 */
export function emitExpression(ctx: CompilationContext, expr: Expression): Vartype {
    switch (expr.kind) {
        case 'Name':
            return emitName(ctx, expr);
        case 'Member':
            return emitMember(ctx, expr);
        case 'Call': {
            const vartype = emitCall(ctx, expr);
            if (ctx.types.isVoid(vartype)) {
                fail(expr, 'A function returning void cannot be used in an expression');
            }
            return vartype;
        }
        case 'Unary':
            return emitUnary(ctx, expr);
        case 'Binary':
            return emitBinary(ctx, expr);
        case 'Ternary':
            return emitTernary(ctx, expr);
        case 'New':
            return emitNew(ctx, expr);
    }
}

function emitName(ctx: CompilationContext, expr: NameExpr): Vartype {
    const entry = ctx.symbols.get(expr.symbol);
    switch (entry.type) {
        case SymbolType.LiteralInt:
        case SymbolType.Constant:
            emit(ctx.code, Opcode.LITTOREG, Register.AX, entry.value);
            return entry.type === SymbolType.LiteralInt ? BuiltinType.Int : entry.vartype;
        case SymbolType.LiteralFloat:
            emit(ctx.code, Opcode.LITTOREG, Register.AX, floatToCell(entry.value));
            return BuiltinType.Float;
        case SymbolType.LiteralString:
            emitRelocated(ctx.code, Register.AX, entry.offset, FixupType.String);
            return BuiltinType.String;
        case SymbolType.LocalVar:
        case SymbolType.GlobalVar: {
            const access = resolveAccess(ctx, expr);
            if (access === null) {
                fail(expr, `'${entry.name}' is not a variable`);
            }
            return emitRead(ctx, expr, access);
        }
        case SymbolType.Function:
            fail(expr, `Function '${entry.name}' must be called`);
        case SymbolType.NoType:
            fail(expr, `Undefined identifier '${entry.name}'`);
        default:
            fail(expr, `'${entry.name}' is ${describeSymbolType(entry.type)} and cannot be used in an expression`);
    }
}

function emitMember(ctx: CompilationContext, expr: MemberExpr): Vartype {
    const access = resolveAccess(ctx, expr);
    if (access === null) {
        fail(expr, `Member function '${expr.member}' must be called`);
    }
    return emitRead(ctx, expr, access);
}

function emitUnary(ctx: CompilationContext, expr: UnaryExpr): Vartype {
    const operand = expr.operand;

    if (expr.operator === '!') {
        const vartype = emitExpression(ctx, operand);
        if (!ctx.types.isInteger(vartype) && !ctx.types.isManagedValue(vartype)) {
            fail(expr, `Operator '!' cannot be applied to '${ctx.types.describe(vartype)}'`);
        }
        emit(ctx.code, Opcode.NOTREG, Register.AX);
        return BuiltinType.Bool;
    }

    // Negative literals are emitted directly
    if (operand.kind === 'Name') {
        const entry = ctx.symbols.get(operand.symbol);
        if (entry.type === SymbolType.LiteralInt) {
            emit(ctx.code, Opcode.LITTOREG, Register.AX, -entry.value | 0);
            return BuiltinType.Int;
        }
        if (entry.type === SymbolType.LiteralFloat) {
            emit(ctx.code, Opcode.LITTOREG, Register.AX, floatToCell(-entry.value));
            return BuiltinType.Float;
        }
    }

    const vartype = emitExpression(ctx, operand);
    const isFloat = ctx.types.isFloat(vartype);
    if (!isFloat && !ctx.types.isInteger(vartype)) {
        fail(expr, `Operator '-' cannot be applied to '${ctx.types.describe(vartype)}'`);
    }
    emit(ctx.code, Opcode.REGTOREG, Register.AX, Register.BX);
    emit(ctx.code, Opcode.LITTOREG, Register.AX, 0);
    emit(ctx.code, isFloat ? Opcode.FSUBREG : Opcode.SUBREG, Register.AX, Register.BX);
    return isFloat ? BuiltinType.Float : BuiltinType.Int;
}

const INT_OPCODES: Record<Exclude<BinaryOperator, '&&' | '||'>, OpcodeValue> = {
    '==': Opcode.ISEQUAL,
    '!=': Opcode.NOTEQUAL,
    '<': Opcode.LESSTHAN,
    '>': Opcode.GREATER,
    '<=': Opcode.LTE,
    '>=': Opcode.GTE,
    '|': Opcode.BITOR,
    '^': Opcode.XORREG,
    '&': Opcode.BITAND,
    '<<': Opcode.SHIFTLEFT,
    '>>': Opcode.SHIFTRIGHT,
    '+': Opcode.ADDREG,
    '-': Opcode.SUBREG,
    '*': Opcode.MULREG,
    '/': Opcode.DIVREG,
    '%': Opcode.MODREG,
};

const FLOAT_OPCODES: Partial<Record<BinaryOperator, OpcodeValue>> = {
    '==': Opcode.ISEQUAL,
    '!=': Opcode.NOTEQUAL,
    '<': Opcode.FLESSTHAN,
    '>': Opcode.FGREATER,
    '<=': Opcode.FLTE,
    '>=': Opcode.FGTE,
    '+': Opcode.FADDREG,
    '-': Opcode.FSUBREG,
    '*': Opcode.FMULREG,
    '/': Opcode.FDIVREG,
};

function isComparison(operator: BinaryOperator): boolean {
    return operator === '==' || operator === '!=' || operator === '<'
        || operator === '>' || operator === '<=' || operator === '>=';
}

function emitBinary(ctx: CompilationContext, expr: BinaryExpr): Vartype {
    if (expr.operator === '&&' || expr.operator === '||') {
        const end = newLabel();
        emitCondition(ctx, expr.left);
        emitJump(ctx.code, expr.operator === '&&' ? Opcode.JZ : Opcode.JNZ, end);
        emitCondition(ctx, expr.right);
        placeLabel(ctx.code, end);
        // 0 or 1
        emit(ctx.code, Opcode.NOTREG, Register.AX);
        emit(ctx.code, Opcode.NOTREG, Register.AX);
        return BuiltinType.Bool;
    }

    const left = emitExpression(ctx, expr.left);
    pushReg(ctx.code, Register.AX);
    const right = emitExpression(ctx, expr.right);
    emit(ctx.code, Opcode.REGTOREG, Register.AX, Register.BX);
    popReg(ctx.code, Register.AX);

    const { opcode, result } = binaryOpcode(ctx, { ...expr, operator: expr.operator }, left, right);
    emit(ctx.code, opcode, Register.AX, Register.BX);
    return result;
}

/**
 * Instruction and result type of a binary operator on the given operands.
 */
function binaryOpcode(
    ctx: CompilationContext,
    expr: ASTNode & { operator: Exclude<BinaryOperator, '&&' | '||'> },
    left: Vartype,
    right: Vartype,
): { opcode: OpcodeValue; result: Vartype } {
    const types = ctx.types;
    const op = expr.operator;
    const comparison = isComparison(op);

    if (types.isInteger(left) && types.isInteger(right)) {
        return { opcode: INT_OPCODES[op], result: comparison ? BuiltinType.Bool : BuiltinType.Int };
    }
    if (types.isFloat(left) && types.isFloat(right)) {
        const opcode = FLOAT_OPCODES[op];
        if (opcode === undefined) {
            fail(expr, `Operator '${op}' cannot be applied to 'float'`);
        }
        return { opcode, result: comparison ? BuiltinType.Bool : BuiltinType.Float };
    }
    if (op === '==' || op === '!=') {
        const isStringLike = (t: Vartype): boolean => types.isLiteralString(t) || types.isStringPointer(t);
        if (isStringLike(left) && isStringLike(right)) {
            return { opcode: op === '==' ? Opcode.STRINGSEQUAL : Opcode.STRINGSNOTEQ, result: BuiltinType.Bool };
        }
        const comparable = (types.isManagedValue(left) && types.isManagedValue(right))
            && (left === right || types.isNull(left) || types.isNull(right));
        if (comparable) {
            return { opcode: INT_OPCODES[op], result: BuiltinType.Bool };
        }
    }
    fail(expr, `Type mismatch: operator '${op}' cannot combine '${types.describe(left)}' and '${types.describe(right)}'`);
}

function emitTernary(ctx: CompilationContext, expr: TernaryExpr): Vartype {
    const whenFalse = newLabel();
    const end = newLabel();

    emitCondition(ctx, expr.condition);
    emitJump(ctx.code, Opcode.JZ, whenFalse);
    const first = emitExpression(ctx, expr.whenTrue);
    emitJump(ctx.code, Opcode.JMP, end);
    placeLabel(ctx.code, whenFalse);
    const second = emitExpression(ctx, expr.whenFalse);
    placeLabel(ctx.code, end);

    const types = ctx.types;
    if (first === second) return first;
    if (types.isInteger(first) && types.isInteger(second)) return BuiltinType.Int;
    if (types.isNull(first) && types.isPointer(second)) return second;
    if (types.isPointer(first) && types.isNull(second)) return first;
    fail(expr, `Type mismatch: the branches of '?:' have types '${types.describe(first)}' and '${types.describe(second)}'`);
}

function emitNew(ctx: CompilationContext, expr: NewExpr): Vartype {
    const struct = ctx.types.struct(expr.vartype);
    if (!struct.qualifiers.has('managed')) {
        fail(expr, `'new' needs a managed struct, '${struct.name}' is not managed`);
    }
    if (struct.qualifiers.has('builtin')) {
        fail(expr, `Builtin struct '${struct.name}' cannot be created with 'new'`);
    }
    const size = ctx.types.sizeOf(expr.vartype, `Creating 'new ${struct.name}'`);
    emit(ctx.code, Opcode.NEWUSEROBJECT, Register.AX, size);
    return ctx.types.pointerTo(expr.vartype);
}

// ============================================================================
// Calls
// ============================================================================

/**
 * Emit a function call; the result is in AX. Returns the return type.
 */
export function emitCall(ctx: CompilationContext, call: CallExpr): Vartype {
    let entry: SymbolEntry;
    let base: ObjectRef | null = null;

    if (call.callee.kind === 'Name') {
        entry = ctx.symbols.get(call.callee.symbol);
        if (entry.type !== SymbolType.Function) {
            fail(call, `'${entry.name}' is ${describeSymbolType(entry.type)}, not a function`);
        }
        if (entry.fn !== null && entry.fn.ownerStruct !== null) {
            fail(call, `Member function '${entry.name}' must be called through an object or its struct`);
        }
    } else if (call.callee.kind === 'Member') {
        const target = resolveMember(ctx, call.callee);
        if (target.member.kind !== 'function') {
            fail(call, `'${target.struct.name}.${target.member.name}' is not a function`);
        }
        entry = ctx.symbols.get(target.member.symbol);
        base = entry.qualifiers.has('static') ? null : target.base;
    } else {
        fail(call, 'Only functions can be called');
    }

    const fn = entry.fn;
    if (fn === null) {
        fail(call, `'${entry.name}' is not a function`);
    }
    const params = fn.params;
    if (call.args.length > params.length) {
        fail(call, `Function '${entry.name}' takes ${params.length} argument(s), but ${call.args.length} were given`);
    }

    const isImport = fn.importIndex >= 0;
    for (let i = params.length - 1; i >= 0; i--) {
        const param = params[i];
        if (param === undefined) continue;
        const arg = call.args[i];
        if (arg !== undefined) {
            emitConverted(ctx, arg, param.vartype, `argument ${i + 1} of '${entry.name}'`);
        } else if (param.defaultValue !== null) {
            emit(ctx.code, Opcode.LITTOREG, Register.AX, param.defaultValue);
        } else {
            fail(call, `Function '${entry.name}' takes ${params.length} argument(s), but ${call.args.length} were given`);
        }
        if (isImport) {
            emit(ctx.code, Opcode.PUSHREAL, Register.AX);
        } else {
            pushReg(ctx.code, Register.AX);
        }
    }

    if (base !== null) {
        loadObjectAddress(ctx, base);
        emit(ctx.code, Opcode.CALLOBJ, Register.MAR);
    }

    if (isImport) {
        emit(ctx.code, Opcode.NUMFUNCARGS, params.length);
        emitRelocated(ctx.code, Register.AX, fn.importIndex, FixupType.Import);
        emit(ctx.code, Opcode.CALLEXT, Register.AX);
        if (params.length > 0) {
            emit(ctx.code, Opcode.SUBREALSTACK, params.length);
        }
    } else {
        const placed = fn.codeLoc >= 0;
        const operand = emitRelocated(ctx.code, Register.AX, placed ? fn.codeLoc : 0, FixupType.Function);
        if (!placed) {
            fn.pendingCalls.push({ loc: operand, section: call.section, line: call.line });
        }
        emit(ctx.code, Opcode.CALL, Register.AX);
        shrinkStack(ctx.code, params.length * 4);
    }

    entry.flags.add('accessed');
    return fn.returnType;
}

// ============================================================================
// Simple Statements
// ============================================================================

/**
 * Resolve an assignment target and check that it may be written.
 */
function writableAccess(ctx: CompilationContext, target: Expression, what: string): Access {
    if (target.kind === 'Name') {
        const entry = ctx.symbols.get(target.symbol);
        switch (entry.type) {
            case SymbolType.LiteralInt:
            case SymbolType.LiteralFloat:
            case SymbolType.LiteralString:
                fail(target, `Cannot ${what} the literal ${entry.name}`);
            case SymbolType.Constant:
                fail(target, `Cannot ${what} the constant '${entry.name}'`);
            case SymbolType.NoType:
                fail(target, `Undefined identifier '${entry.name}'`);
        }
    }

    const access = resolveAccess(ctx, target);
    if (access === null) {
        fail(target, `Cannot ${what} this expression: it is not a variable`);
    }

    switch (access.kind) {
        case 'this':
            fail(target, `Cannot ${what} 'this'`);
        case 'local':
        case 'global':
        case 'import': {
            const qualifiers = access.entry.qualifiers;
            if (qualifiers.has('const')) {
                fail(target, `Cannot ${what} '${access.entry.name}': it is declared 'const'`);
            }
            if (qualifiers.has('readonly')) {
                fail(target, `Cannot ${what} '${access.entry.name}': it is declared 'readonly'`);
            }
            break;
        }
        case 'field': {
            const qualifiers = access.member.qualifiers;
            if (qualifiers.has('readonly')) {
                fail(target, `Cannot ${what} '${access.member.name}': it is declared 'readonly'`);
            }
            if (qualifiers.has('writeprotected') && !access.viaThis) {
                fail(target, `Cannot ${what} '${access.member.name}': it is writeprotected outside of its struct's member functions`);
            }
            break;
        }
        case 'attribute':
            if (access.member.qualifiers.has('readonly')) {
                fail(target, `Cannot ${what} '${access.member.name}': the attribute is readonly`);
            }
            break;
    }
    return access;
}

const MODIFY_INT_OPCODES: Record<ModifyOperator, OpcodeValue> = {
    '+': Opcode.ADDREG,
    '-': Opcode.SUBREG,
    '*': Opcode.MULREG,
    '/': Opcode.DIVREG,
    '%': Opcode.MODREG,
    '&': Opcode.BITAND,
    '|': Opcode.BITOR,
    '^': Opcode.XORREG,
    '<<': Opcode.SHIFTLEFT,
    '>>': Opcode.SHIFTRIGHT,
};

const MODIFY_FLOAT_OPCODES: Partial<Record<ModifyOperator, OpcodeValue>> = {
    '+': Opcode.FADDREG,
    '-': Opcode.FSUBREG,
    '*': Opcode.FMULREG,
    '/': Opcode.FDIVREG,
};

function emitAssign(ctx: CompilationContext, stmt: AssignStatement): void {
    const operator = stmt.operator;
    const what = operator === null ? 'assign to' : `apply '${operator}=' to`;
    const access = writableAccess(ctx, stmt.target, what);

    if (operator === null) {
        emitConverted(ctx, stmt.value, access.vartype, 'assignment');
        emitWrite(ctx, stmt, access);
        return;
    }

    const isFloat = ctx.types.isFloat(access.vartype);
    const opcode = isFloat ? MODIFY_FLOAT_OPCODES[operator] : MODIFY_INT_OPCODES[operator];
    if (opcode === undefined || (!isFloat && !ctx.types.isInteger(access.vartype))) {
        fail(stmt, `Operator '${operator}=' cannot be applied to '${ctx.types.describe(access.vartype)}'`);
    }

    emitConverted(ctx, stmt.value, access.vartype, 'assignment');
    pushReg(ctx.code, Register.AX);
    if (access.kind === 'attribute') {
        emitAttributeGet(ctx, stmt, access);
        popReg(ctx.code, Register.BX);
        emit(ctx.code, opcode, Register.AX, Register.BX);
        emitAttributeSet(ctx, stmt, access);
        return;
    }
    markRead(access);
    loadAddress(ctx, access);
    popReg(ctx.code, Register.BX);
    emit(ctx.code, readOpcode(ctx, stmt, access.vartype), Register.AX);
    emit(ctx.code, opcode, Register.AX, Register.BX);
    emit(ctx.code, writeOpcode(ctx, stmt, access.vartype), Register.AX);
}

function emitIncDec(ctx: CompilationContext, stmt: IncDecStatement): void {
    const access = writableAccess(ctx, stmt.target, `apply '${stmt.operator}' to`);
    if (!ctx.types.isInteger(access.vartype)) {
        fail(stmt, `Operator '${stmt.operator}' needs an integer, not '${ctx.types.describe(access.vartype)}'`);
    }
    const opcode = stmt.operator === '++' ? Opcode.ADD : Opcode.SUB;

    if (access.kind === 'attribute') {
        emitAttributeGet(ctx, stmt, access);
        emit(ctx.code, opcode, Register.AX, 1);
        emitAttributeSet(ctx, stmt, access);
        return;
    }
    markRead(access);
    loadAddress(ctx, access);
    emit(ctx.code, readOpcode(ctx, stmt, access.vartype), Register.AX);
    emit(ctx.code, opcode, Register.AX, 1);
    emit(ctx.code, writeOpcode(ctx, stmt, access.vartype), Register.AX);
}

export function emitSimpleStatement(ctx: CompilationContext, stmt: SimpleStatement): void {
    switch (stmt.kind) {
        case 'Assign':
            emitAssign(ctx, stmt);
            break;
        case 'IncDec':
            emitIncDec(ctx, stmt);
            break;
        case 'CallStatement':
            emitCall(ctx, stmt.call);
            break;
    }
}
