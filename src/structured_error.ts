/**
 * Structured errors for the overlay builder.
 *
 * Pipeline failures are returned as values (see overlay/types.ts); the codes
 * here classify them so callers and the CLI can decide what to do next.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Caller can fix by reconfiguring the build
    | 'CONFIG_ERROR'

    // Resource compiler rejected the input
    | 'COMPILER_ERROR'

    // A tool reported success but its output file is missing
    | 'INTEGRITY_ERROR'

    // zipalign / signer
    | 'POSTPROCESS_ERROR'

    // Infrastructure
    | 'FILESYSTEM_ERROR'
    | 'TOOL_ERROR';

export type Severity = 'FATAL' | 'ERROR';

export interface RecoveryHint {
    description: string;
    env_vars?: Record<string, string>;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_hints: RecoveryHint[];
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Thrown errors                                                              */
/* -------------------------------------------------------------------------- */

export class OverlayError extends Error {
    constructor(message: string, public readonly code: ErrorCode, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'OverlayError';
    }
}

export class OverlayConfigError extends OverlayError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR');
        this.name = 'OverlayConfigError';
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/** Classify anything thrown inside a stage; unknown errors are treated as filesystem faults. */
export function errorCodeOf(e: unknown): ErrorCode {
    return e instanceof OverlayError ? e.code : 'FILESYSTEM_ERROR';
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

const FATAL_CODES: ErrorCode[] = ['FILESYSTEM_ERROR', 'TOOL_ERROR'];

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: FATAL_CODES.includes(code) ? 'FATAL' : 'ERROR',
        context,
        recovery_hints: recoveryHintsFor(code),
        timestamp: new Date().toISOString(),
    };
}

export function recoveryHintsFor(code: ErrorCode): RecoveryHint[] {
    switch (code) {
        case 'CONFIG_ERROR':
            return [{ description: 'Add at least one resource directory and make sure the output directory is writable' }];
        case 'COMPILER_ERROR':
            return [
                { description: 'Fix the resources reported by the compiler' },
                { description: 'Allow the legacy compile fallback: overlay-forge prefs set force_new_compiler false' },
            ];
        case 'INTEGRITY_ERROR':
            return [{ description: 'Check that the resource compiler binary matches the target platform' }];
        case 'POSTPROCESS_ERROR':
            return [{ description: 'Check zipalign/apksigner paths and the signing keystore', env_vars: { OVERLAY_KEYSTORE: '<path>' } }];
        case 'TOOL_ERROR':
            return [{ description: 'Point OVERLAY_AAPT / OVERLAY_ZIPALIGN / OVERLAY_APKSIGNER at working binaries' }];
        case 'FILESYSTEM_ERROR':
            return [];
    }
}
