/**
 * gscript Module - Fixup Validation and Linking
 *
 * SPDX-License-Identifier: MIT
 *
 * The reference for what a loader does with a module: every fixup cell is
 * rebased onto the segment it points into, or bound to an imported
 * address.
 */

import { FixupType, FIXUP_TYPE_NAMES, MODULE_CONSTANTS, LinkError, isFixupType } from './types.ts';
import type { ScriptModule, FixupTypeValue } from './types.ts';
import { InternalError } from '../compiler/errors.ts';

/**
 * Where the loader placed each segment.
 */
export interface LinkBases {
    code: number;
    globals: number;
    strings: number;
    stack: number;
}

/**
 * Address of an import, or undefined when the host does not provide it.
 */
export type ImportResolver = (name: string) => number | undefined;

/**
 * Check the fixup list against the code.
 *
 * @throws InternalError when a fixup lies outside the code, two fixups of
 *   different types share a cell, or a target disagrees with its cell
 */
export function validateFixups(module: ScriptModule): void {
    const seen = new Map<number, FixupTypeValue>();
    for (const fixup of module.fixups) {
        const { codeLoc, type } = fixup;
        if (!Number.isInteger(codeLoc) || codeLoc < 0 || codeLoc >= module.code.length) {
            throw new InternalError(`Fixup at ${codeLoc} is outside of the code (${module.code.length} cells)`);
        }
        if (!isFixupType(type)) {
            throw new InternalError(`Fixup at ${codeLoc} has the unknown type ${type}`);
        }
        const previous = seen.get(codeLoc);
        if (previous !== undefined && previous !== type) {
            throw new InternalError(
                `Conflicting fixups at ${codeLoc}: ${FIXUP_TYPE_NAMES[previous]} and ${FIXUP_TYPE_NAMES[type]}`,
            );
        }
        seen.set(codeLoc, type);
        if (module.code[codeLoc] !== fixup.target) {
            throw new InternalError(`Fixup at ${codeLoc} targets ${fixup.target}, but the cell holds ${module.code[codeLoc]}`);
        }
        if (type === FixupType.Import && (fixup.target < 0 || fixup.target >= module.imports.length)) {
            throw new InternalError(`Fixup at ${codeLoc} refers to import ${fixup.target} of ${module.imports.length}`);
        }
    }
}

/**
 * Patch a copy of the module's code for the given segment bases.
 *
 * Unresolved `_tryimport` imports bind to 0.
 *
 * @throws LinkError for an unresolved standard import
 */
export function linkModule(module: ScriptModule, bases: LinkBases, resolveImport: ImportResolver): Int32Array {
    validateFixups(module);
    const code = Int32Array.from(module.code);

    const addresses = module.imports.map(entry => {
        const address = resolveImport(entry.name);
        if (address !== undefined) return address;
        if (entry.optional) return 0;
        throw new LinkError(`Unresolved import '${entry.name}'`, entry.name);
    });

    for (const fixup of module.fixups) {
        code[fixup.codeLoc] = patchedValue(fixup.type, fixup.target, bases, addresses);
    }
    return code;
}

/**
 * CodeLocs of the module's initializer routines, in the order the loader
 * runs them.
 */
export function initializerEntries(module: ScriptModule): number[] {
    return module.sections
        .filter(s => s.name.endsWith(MODULE_CONSTANTS.INITIALIZER_SUFFIX))
        .map(s => s.codeLoc);
}

function patchedValue(type: FixupTypeValue, target: number, bases: LinkBases, imports: readonly number[]): number {
    switch (type) {
        case FixupType.GlobalData:
            return bases.globals + target;
        case FixupType.Function:
            return bases.code + target;
        case FixupType.String:
            return bases.strings + target;
        case FixupType.Stack:
            return bases.stack + target;
        case FixupType.Import:
            return imports[target] ?? 0;
    }
}
