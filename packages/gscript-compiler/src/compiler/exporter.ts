/**
 * gscript Exporter
 *
 * SPDX-License-Identifier: MIT
 *
 * Builds the export table from the symbol table after a successful parse.
 */

import { SymbolType, ScopeType } from './types.ts';
import type { SymbolTable } from './symbol-table.ts';
import type { TypeRegistry } from './type-registry.ts';
import { UserError } from './errors.ts';
import { ExportType } from '../module/types.ts';
import type { ExportEntry } from '../module/types.ts';

/**
 * Every symbol flagged both exported and accessed, in symbol id order.
 *
 * @throws UserError for an exported function without a body, or a variable
 *   whose type is a pointer to a struct that was never completed
 */
export function buildExports(symbols: SymbolTable, types: TypeRegistry): ExportEntry[] {
    const exports: ExportEntry[] = [];

    for (const entry of symbols.all()) {
        if (!entry.flags.has('exported') || !entry.flags.has('accessed')) continue;

        if (entry.type === SymbolType.Function && entry.fn !== null) {
            if (entry.fn.codeLoc < 0) {
                throw new UserError(`Exported function '${entry.name}' is never defined`, entry.section, entry.line);
            }
            exports.push({
                name: entry.name,
                type: ExportType.Function,
                address: entry.fn.codeLoc,
                paramCount: entry.fn.params.length,
            });
            continue;
        }

        if (entry.type === SymbolType.GlobalVar && entry.scope === ScopeType.Global) {
            const vartype = entry.vartype;
            if (types.isPointer(vartype) && !types.isComplete(types.pointerTarget(vartype))) {
                throw new UserError(
                    `Exported variable '${entry.name}' points to struct '${types.describe(types.pointerTarget(vartype))}', which is never completed`,
                    entry.section,
                    entry.line,
                );
            }
            exports.push({ name: entry.name, type: ExportType.Data, address: entry.offset, paramCount: 0 });
        }
    }
    return exports;
}
