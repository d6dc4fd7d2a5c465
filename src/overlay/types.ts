// src/overlay/types.ts

import type { ErrorCode } from '../structured_error';

export type MetadataEntry = readonly [name: string, value: string];

export interface OverlaySpec {
    readonly packageName: string;
    readonly targetPackageName: string;
    /** Install timestamp in epoch millis; written into the manifest as metadata. */
    readonly timestamp: number;
    readonly versionCode?: number;
    readonly versionName?: string;
    readonly label?: string;
    readonly metadata: readonly MetadataEntry[];
    readonly outDir: string;
    /** May name packages that are absent on this device; those are skipped at compile time. */
    readonly extraBasePackages: readonly string[];
    readonly resourceDirs: readonly string[];
    readonly assetDir?: string;
}

export type PlatformVendor = 'generic' | 'samsung';

export interface PlatformProfile {
    readonly vendor: PlatformVendor;
    /** Unrooted Samsung overlay service (Synergy) is present */
    readonly synergy: boolean;
    /** Android API level */
    readonly osVersion: number;
}

/* -------------------------------------------------------------------------- */
/* Result                                                                     */
/* -------------------------------------------------------------------------- */

export interface Success {
    readonly kind: 'success';
    readonly path: string;
}

export interface Failure {
    readonly kind: 'failure';
    readonly message: string;
    readonly code: ErrorCode;
}

export type Result = Success | Failure;

export function success(path: string): Success {
    return { kind: 'success', path };
}

export function failure(message: string, code: ErrorCode): Failure {
    return { kind: 'failure', message, code };
}

export function isSuccess(r: Result): r is Success {
    return r.kind === 'success';
}

export function isFailure(r: Result): r is Failure {
    return r.kind === 'failure';
}

/** Files a build writes into the output directory for one overlay package. */
export interface OverlayArtifactPaths {
    unsigned: string;
    aligned: string;
    signed: string;
}
