/**
 * gscript Message Handler
 *
 * SPDX-License-Identifier: MIT
 *
 * Collects the diagnostics of one compilation unit in emission order.
 */

export const Severity = {
    None: 0,
    Info: 1,
    Warning: 2,
    Error: 3,
    /** A broken compiler invariant, as opposed to a problem in the script */
    InternalError: 4,
} as const;

export type SeverityValue = typeof Severity[keyof typeof Severity];

/**
 * One diagnostic. Entries are never mutated after creation.
 */
export interface MessageEntry {
    readonly severity: SeverityValue;
    readonly section: string;
    readonly line: number;
    readonly message: string;
}

/**
 * Returned by getError() when the unit has no error.
 */
export const NO_ERROR: MessageEntry = Object.freeze({
    severity: Severity.None,
    section: '',
    line: 0,
    message: '',
});

export class MessageHandler {
    private entries: MessageEntry[] = [];

    addMessage(severity: SeverityValue, section: string, line: number, message: string): void {
        this.entries.push(Object.freeze({ severity, section, line, message }));
    }

    /**
     * Snapshot of the entries; later additions are not reflected.
     */
    getMessages(): MessageEntry[] {
        return [...this.entries];
    }

    /**
     * The first error or internal error, or NO_ERROR.
     */
    getError(): MessageEntry {
        return this.entries.find(e => e.severity >= Severity.Error) ?? NO_ERROR;
    }

    hasError(): boolean {
        return this.getError() !== NO_ERROR;
    }

    warnings(): MessageEntry[] {
        return this.entries.filter(e => e.severity === Severity.Warning);
    }

    clear(): void {
        this.entries = [];
    }
}

const SEVERITY_NAMES: Record<SeverityValue, string> = {
    [Severity.None]: 'none',
    [Severity.Info]: 'info',
    [Severity.Warning]: 'warning',
    [Severity.Error]: 'error',
    [Severity.InternalError]: 'internal error',
};

export function severityName(severity: SeverityValue): string {
    return SEVERITY_NAMES[severity];
}

/**
 * Render an entry as `section(line): severity: message`.
 */
export function formatMessage(entry: MessageEntry): string {
    return `${entry.section}(${entry.line}): ${severityName(entry.severity)}: ${entry.message}`;
}
