/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the overlay builder and backend resolver.
 * Values can be overridden via environment variables.
 */

import * as os from 'os';
import * as path from 'path';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) ? n : fallback;
}

function envFlag(name: string): boolean {
    const raw = process.env[name];
    return raw === '1' || raw === 'true';
}

// External build tools; bare names are looked up on PATH
export const TOOL_PATHS = {
    AAPT: process.env.OVERLAY_AAPT || 'aapt',
    ZIPALIGN: process.env.OVERLAY_ZIPALIGN || 'zipalign',
    APKSIGNER: process.env.OVERLAY_APKSIGNER || 'apksigner',
};

// Base framework package every overlay is compiled against
export const FRAMEWORK_RES_PATH = process.env.OVERLAY_FRAMEWORK_RES || '/system/framework/framework-res.apk';

export const SIGNING = {
    KEYSTORE: process.env.OVERLAY_KEYSTORE || path.join(os.homedir(), '.overlay-forge', 'overlay.keystore'),
    KEYSTORE_PASS: process.env.OVERLAY_KEYSTORE_PASS || 'overlay',
    KEY_ALIAS: process.env.OVERLAY_KEY_ALIAS || '',
    /** Variable apksigner reads the keystore password from (`--ks-pass env:<name>`) */
    PASSWORD_ENV_VAR: 'OVERLAY_KEYSTORE_PASS',
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    TOOL_MS: envInt('OVERLAY_TOOL_TIMEOUT', 120000), // 0 = wait forever
};

export const PREFERENCES_DB = process.env.OVERLAY_PREFS_DB || path.join(os.homedir(), '.overlay-forge', 'prefs.db');

// Platform profile of the device the overlays are built for
export const PLATFORM = {
    VENDOR: process.env.OVERLAY_VENDOR === 'samsung' ? 'samsung' as const : 'generic' as const,
    SYNERGY: envFlag('OVERLAY_SYNERGY'),
    OS_VERSION: envInt('OVERLAY_OS_VERSION', 28),
};

// Android API levels that gate manifest and backend branches
export const SDK_LEVELS = {
    PIE: 28,
    Q: 29,
};

export const MANIFEST = {
    ANDROID_NS: 'http://schemas.android.com/apk/res/android',
    FILE_NAME: 'AndroidManifest.xml',
    OVERLAY_PERMISSION: 'projekt.substratum.permission.OVERLAY',
    SAMSUNG_OVERLAY_PERMISSION: 'com.samsung.android.permission.SAMSUNG_OVERLAY_COMPONENT',
    METADATA_INSTALL_TIMESTAMP: 'overlay_install_timestamp',
};

// Targets that ship as standalone overlays on Samsung firmware and reject the vendor permission
export const SAMSUNG_PERMISSION_EXEMPT_TARGETS: readonly string[] = [
    'com.sec.android.app.music',
    'com.sec.android.app.voicenote',
];

export const COMPILER = {
    LEGACY_MARKER: 'types not allowed',
    FORCE_NEW_COMPILER_PREF: 'force_new_compiler',
    ZIPALIGN_BOUNDARY: 4,
};

export const COMPANION_ACCESS_PERMISSION = 'projekt.andromeda.permission.ACCESS';
