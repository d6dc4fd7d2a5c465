// src/overlay/spec_builder.ts

import * as path from 'path';
import { OverlayConfigError } from '../structured_error';
import type { MetadataEntry, OverlaySpec } from './types';

export interface OverlaySpecInit {
    packageName: string;
    targetPackageName: string;
    timestamp: number;
    versionCode?: number;
    versionName?: string;
    label?: string;
    metadata?: Iterable<readonly [string, string]>;
    outDir: string;
}

/**
 * Accumulates the list-valued parts of an overlay description and freezes
 * everything into an {@link OverlaySpec}.
 */
export class OverlaySpecBuilder {
    private readonly init: OverlaySpecInit;
    private readonly extraBasePackages: string[] = [];
    private readonly resourceDirs: string[] = [];
    private assetDir: string | undefined;

    constructor(init: OverlaySpecInit) {
        this.init = init;
    }

    /**
     * Adds a base package (APK) to compile against, like aapt's `-I`.
     * May be called repeatedly; packages missing on disk are skipped at compile time.
     */
    addExtraBasePackage(basePackage: string): this {
        this.extraBasePackages.push(basePackage);
        return this;
    }

    /** Adds a resource directory, like aapt's `-S`. Order is kept. */
    addResourceDir(resDir: string): this {
        this.resourceDirs.push(path.resolve(resDir));
        return this;
    }

    /** aapt takes a single asset directory, so this replaces any previous one. */
    setAssetDir(assetDir: string): this {
        this.assetDir = path.resolve(assetDir);
        return this;
    }

    build(): OverlaySpec {
        const { packageName, targetPackageName } = this.init;
        if (!packageName.trim()) {
            throw new OverlayConfigError('Overlay package name cannot be empty');
        }
        if (!targetPackageName.trim()) {
            throw new OverlayConfigError('Target package name cannot be empty');
        }

        const metadata: MetadataEntry[] = [];
        for (const [name, value] of this.init.metadata ?? []) {
            metadata.push(Object.freeze([name, value] as const));
        }

        const spec: OverlaySpec = {
            packageName,
            targetPackageName,
            timestamp: this.init.timestamp,
            versionCode: this.init.versionCode,
            versionName: this.init.versionName,
            label: this.init.label,
            metadata: Object.freeze(metadata),
            outDir: path.resolve(this.init.outDir),
            extraBasePackages: Object.freeze([...this.extraBasePackages]),
            resourceDirs: Object.freeze([...this.resourceDirs]),
            assetDir: this.assetDir,
        };
        return Object.freeze(spec);
    }
}
