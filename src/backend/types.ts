// src/backend/types.ts

export type BackendKind =
    | 'companion-samsung'
    | 'companion'
    | 'system-service'
    | 'root-modern'
    | 'root-legacy'
    | 'vendor-app';

/** Highest priority first. The first enabled and satisfied backend wins. */
export const BACKEND_PRIORITY: readonly BackendKind[] = [
    'companion-samsung',
    'companion',
    'system-service',
    'root-modern',
    'root-legacy',
    'vendor-app',
];

export function isBackendKind(value: string): value is BackendKind {
    return BACKEND_PRIORITY.some(k => k === value);
}

/**
 * Strategy that installs and manages overlays on a device. The resolver only
 * chooses one; what it does with overlays is up to the implementation.
 */
export interface Backend {
    readonly kind: BackendKind;
}

export type BackendFactory = () => Backend;

/** Which backends the caller is willing to use. Missing kinds count as disabled. */
export type BackendSupport = Partial<Record<BackendKind, boolean>>;

export interface CapabilityCheck {
    readonly name: BackendKind;
    readonly enabled: boolean;
    readonly predicate: () => boolean;
    readonly factory: BackendFactory;
    /** Runtime permission the backend needs already granted; root backends elevate on their own. */
    readonly requiredPermission?: string;
}
