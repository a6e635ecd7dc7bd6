/**
 * gscript Compiler Errors
 *
 * SPDX-License-Identifier: MIT
 */

/**
 * Compiler error with source location.
 *
 * A location of line 0 means "not known where thrown"; the driver fills
 * in the position of the symbol being processed.
 */
export class CompilerError extends Error {
    section: string;
    line: number;
    /** The message without location prefix */
    detail: string;

    constructor(detail: string, section = '', line = 0) {
        super(line > 0 ? `${section}(${line}): ${detail}` : detail);
        this.name = 'CompilerError';
        this.detail = detail;
        this.section = section;
        this.line = line;
    }

    /**
     * Copy of this error placed at the given location.
     */
    at(section: string, line: number): CompilerError {
        return new CompilerError(this.detail, section, line);
    }
}

/**
 * A problem in the script: syntax, type mismatch, redeclaration,
 * unresolved reference.
 */
export class UserError extends CompilerError {
    constructor(detail: string, section = '', line = 0) {
        super(detail, section, line);
        this.name = 'UserError';
    }

    override at(section: string, line: number): UserError {
        return new UserError(this.detail, section, line);
    }
}

/**
 * A broken compiler invariant.
 */
export class InternalError extends CompilerError {
    constructor(detail: string, section = '', line = 0) {
        super(detail, section, line);
        this.name = 'InternalError';
    }

    override at(section: string, line: number): InternalError {
        return new InternalError(this.detail, section, line);
    }
}
