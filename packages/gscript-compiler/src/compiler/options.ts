/**
 * gscript Compiler Options
 *
 * SPDX-License-Identifier: MIT
 */

/**
 * Options for compilation functions.
 */
export interface CompileOptions {
    /**
     * Section name used in diagnostics when the source carries no section
     * marker.
     * Default: 'main'
     */
    sectionName?: string;

    /**
     * Emit a LINENUM instruction whenever a statement starts on a new line.
     * Default: true
     */
    emitLineNumbers?: boolean;

    /**
     * Warn about local variables and parameters that are never read.
     * Default: true
     */
    warnUnused?: boolean;

    /**
     * Log a summary of each phase via console.debug.
     * Default: false
     */
    verbose?: boolean;
}

export type ResolvedOptions = Required<CompileOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
    sectionName: 'main',
    emitLineNumbers: true,
    warnUnused: true,
    verbose: false,
};

export function resolveOptions(options?: CompileOptions): ResolvedOptions {
    return {
        sectionName: options?.sectionName ?? DEFAULT_OPTIONS.sectionName,
        emitLineNumbers: options?.emitLineNumbers ?? DEFAULT_OPTIONS.emitLineNumbers,
        warnUnused: options?.warnUnused ?? DEFAULT_OPTIONS.warnUnused,
        verbose: options?.verbose ?? DEFAULT_OPTIONS.verbose,
    };
}
