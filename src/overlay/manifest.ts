// src/overlay/manifest.ts

import * as fs from 'fs';
import * as path from 'path';
import { MANIFEST, SAMSUNG_PERMISSION_EXEMPT_TARGETS, SDK_LEVELS } from '../config';
import { createLogger } from '../logger';
import { OverlayError, errorMessage } from '../structured_error';
import { writeDocument } from './document_writer';
import type { OverlaySpec, PlatformProfile } from './types';

const log = createLogger('manifest');

/** Unrooted Samsung (Synergy) overlays on Q and later must target the running SDK. */
export function needsTargetSdk(profile: PlatformProfile): boolean {
    return profile.synergy && profile.osVersion >= SDK_LEVELS.Q;
}

/** Samsung needs its own permission on overlays, except for targets that ship standalone overlays. */
export function needsSamsungPermission(profile: PlatformProfile, targetPackageName: string): boolean {
    if (profile.vendor !== 'samsung') return false;
    return !SAMSUNG_PERMISSION_EXEMPT_TARGETS.includes(targetPackageName);
}

export class ManifestGenerator {
    constructor(private readonly profile: PlatformProfile) {}

    generate(spec: OverlaySpec): string {
        const profile = this.profile;

        return writeDocument(doc => {
            doc.element('manifest', manifest => {
                manifest.attribute('xmlns:android', MANIFEST.ANDROID_NS);
                manifest.attribute('package', spec.packageName);
                if (spec.versionCode !== undefined) {
                    manifest.attribute('android:versionCode', String(spec.versionCode));
                }
                if (spec.versionName !== undefined) {
                    manifest.attribute('android:versionName', spec.versionName);
                }

                manifest.element('overlay', overlay => {
                    overlay.attribute('android:targetPackage', spec.targetPackageName);
                });

                if (needsTargetSdk(profile)) {
                    manifest.element('uses-sdk', sdk => {
                        sdk.attribute('android:targetSdkVersion', String(profile.osVersion));
                    });
                }

                if (needsSamsungPermission(profile, spec.targetPackageName)) {
                    manifest.element('uses-permission', perm => {
                        perm.attribute('android:name', MANIFEST.SAMSUNG_OVERLAY_PERMISSION);
                    });
                }

                // Lets managers list installed overlays by permission
                manifest.element('uses-permission', perm => {
                    perm.attribute('android:name', MANIFEST.OVERLAY_PERMISSION);
                });

                manifest.element('application', app => {
                    app.attribute('android:allowBackup', 'false');
                    app.attribute('android:hasCode', 'false');
                    if (spec.label !== undefined) {
                        app.attribute('android:label', spec.label);
                    }

                    for (const [name, value] of spec.metadata) {
                        app.element('meta-data', meta => {
                            meta.attribute('android:name', name);
                            meta.attribute('android:value', value);
                        });
                    }

                    app.element('meta-data', meta => {
                        meta.attribute('android:name', MANIFEST.METADATA_INSTALL_TIMESTAMP);
                        meta.attribute('android:value', String(spec.timestamp));
                    });
                });
            });
        });
    }

    /** Writes the manifest into `workDir` and returns its path. */
    write(spec: OverlaySpec, workDir: string): string {
        const manifestPath = path.join(workDir, MANIFEST.FILE_NAME);
        const text = this.generate(spec);
        try {
            fs.writeFileSync(manifestPath, text, 'utf8');
        } catch (e) {
            throw new OverlayError(`Failed to write overlay manifest: ${errorMessage(e)}`, 'FILESYSTEM_ERROR', e);
        }
        log.debug('Manifest written', { path: manifestPath, bytes: Buffer.byteLength(text) });
        return manifestPath;
    }
}
