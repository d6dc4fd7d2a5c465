// src/backend/environment.ts

import type { PlatformProfile } from '../overlay/types';
import { findExecutableOnPath } from '../tool_locator';

/**
 * Everything the backend resolver reads about the device. Built once at
 * startup; tests substitute their own.
 */
export interface Environment {
    readonly profile: PlatformProfile;
    /** Companion service daemon answers */
    companionReachable(): boolean;
    /** Connects to the companion service; false when the handshake fails */
    initializeCompanion(): boolean;
    systemServiceBridgePresent(): boolean;
    rootAvailable(): boolean;
    /** Vendor companion app (Synergy) is installed */
    companionAppInstalled(): boolean;
    permissionGranted(permission: string): boolean;
}

/** True when an executable `su` exists in one of the colon-separated directories. */
export function isRootAvailable(pathVar: string | undefined): boolean {
    return findExecutableOnPath('su', pathVar, ':') !== null;
}

/** Memoises a probe after its first call. */
export function once(probe: () => boolean): () => boolean {
    let cached: boolean | undefined;
    return () => {
        if (cached === undefined) cached = probe();
        return cached;
    };
}

export interface EnvironmentProbes {
    companionReachable?: () => boolean;
    initializeCompanion?: () => boolean;
    systemServiceBridgePresent?: () => boolean;
    companionAppInstalled?: () => boolean;
}

export interface ProcessEnvironmentOptions {
    profile: PlatformProfile;
    probes?: EnvironmentProbes;
    grantedPermissions?: Iterable<string>;
    /** Defaults to process.env.PATH, read on every root check */
    pathVar?: string;
}

/**
 * Environment for the running process. Service presence probes run at most
 * once; root availability is re-checked on every call.
 */
export function createProcessEnvironment(options: ProcessEnvironmentOptions): Environment {
    const probes = options.probes ?? {};
    const granted = new Set(options.grantedPermissions ?? []);
    const absent = () => false;

    return {
        profile: options.profile,
        companionReachable: once(probes.companionReachable ?? absent),
        initializeCompanion: probes.initializeCompanion ?? absent,
        systemServiceBridgePresent: once(probes.systemServiceBridgePresent ?? absent),
        rootAvailable: () => isRootAvailable(options.pathVar ?? process.env.PATH),
        companionAppInstalled: probes.companionAppInstalled ?? absent,
        permissionGranted: permission => granted.has(permission),
    };
}
