// src/overlay/pipeline.ts

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { PLATFORM, PREFERENCES_DB, TOOL_PATHS } from '../config';
import { clearCorrelation, createLogger, setCorrelation } from '../logger';
import { LazySqlitePreferenceStore, type PreferenceStore } from '../preferences';
import { errorCodeOf, errorMessage } from '../structured_error';
import { SpawnToolInvoker, type ToolInvoker } from '../tool_invoker';
import { ToolLocator } from '../tool_locator';
import { CompileStage } from './compile_stage';
import { ManifestGenerator } from './manifest';
import { PostProcessStage, ToolApkSigner, discardIntermediates, type ApkSigner } from './post_process';
import { failure, isFailure, type OverlaySpec, type PlatformProfile, type Result } from './types';

const log = createLogger('pipeline');

export interface OverlayToolPaths {
    aapt: string;
    zipalign: string;
    apksigner: string;
}

export interface OverlayPipelineOptions {
    invoker?: ToolInvoker;
    /** Defaults to the SQLite store at `preferencesDb`, opened only when read */
    preferences?: PreferenceStore;
    preferencesDb?: string;
    profile?: PlatformProfile;
    /** Paths or bare names; bare names are resolved on PATH. */
    tools?: Partial<OverlayToolPaths>;
    locator?: ToolLocator;
    /** Replaces the apksigner-backed signer */
    signer?: ApkSigner;
    frameworkResPath?: string;
    /** Parent directory for per-build scratch directories */
    workRoot?: string;
}

export function defaultPlatformProfile(): PlatformProfile {
    return { vendor: PLATFORM.VENDOR, synergy: PLATFORM.SYNERGY, osVersion: PLATFORM.OS_VERSION };
}

function removeWorkDir(workDir: string): void {
    try {
        fs.rmSync(workDir, { recursive: true, force: true });
    } catch (e) {
        log.warn(`Could not remove work directory ${workDir}: ${errorMessage(e)}`);
    }
}

/**
 * Builds one overlay: manifest, compile, align, sign. Every exec() owns a
 * fresh scratch directory that is gone again when exec() returns, so
 * separate pipeline instances can build in parallel.
 *
 * Tools run synchronously; without a timeout (OVERLAY_TOOL_TIMEOUT=0) a
 * hung tool blocks exec() indefinitely.
 */
export class OverlayPipeline {
    private readonly manifest: ManifestGenerator;
    private readonly compileStage: CompileStage;
    private readonly postProcess: PostProcessStage;
    private readonly workRoot: string;
    private readonly ownedPreferences: LazySqlitePreferenceStore | undefined;

    constructor(private readonly spec: OverlaySpec, options: OverlayPipelineOptions = {}) {
        const invoker = options.invoker ?? new SpawnToolInvoker();
        const locator = options.locator ?? new ToolLocator();
        const tools: OverlayToolPaths = {
            aapt: locator.resolve(options.tools?.aapt ?? TOOL_PATHS.AAPT),
            zipalign: locator.resolve(options.tools?.zipalign ?? TOOL_PATHS.ZIPALIGN),
            apksigner: locator.resolve(options.tools?.apksigner ?? TOOL_PATHS.APKSIGNER),
        };

        let preferences = options.preferences;
        if (preferences === undefined) {
            this.ownedPreferences = new LazySqlitePreferenceStore(options.preferencesDb ?? PREFERENCES_DB);
            preferences = this.ownedPreferences;
        }

        this.manifest = new ManifestGenerator(options.profile ?? defaultPlatformProfile());
        this.compileStage = new CompileStage({
            invoker,
            preferences,
            compilerPath: tools.aapt,
            frameworkResPath: options.frameworkResPath,
        });
        this.postProcess = new PostProcessStage({
            invoker,
            alignerPath: tools.zipalign,
            signer: options.signer ?? new ToolApkSigner(invoker, tools.apksigner),
        });
        this.workRoot = options.workRoot ?? os.tmpdir();
    }

    exec(): Result {
        const buildId = uuidv4();
        setCorrelation({ buildId, target: this.spec.packageName });

        let workDir: string | undefined;
        try {
            workDir = fs.mkdtempSync(path.join(this.workRoot, 'overlay_builder-'));
            log.info('Building overlay', { target_package: this.spec.targetPackageName, work_dir: workDir });
            return this.runStages(workDir);
        } catch (e) {
            log.error(`Overlay build aborted: ${errorMessage(e)}`);
            return failure(errorMessage(e), errorCodeOf(e));
        } finally {
            if (workDir !== undefined) removeWorkDir(workDir);
            this.closePreferences();
            clearCorrelation();
        }
    }

    private closePreferences(): void {
        try {
            this.ownedPreferences?.close();
        } catch (e) {
            log.warn(`Could not close preferences: ${errorMessage(e)}`);
        }
    }

    private runStages(workDir: string): Result {
        setCorrelation({ stage: 'manifest' });
        this.manifest.write(this.spec, workDir);

        setCorrelation({ stage: 'compile' });
        const compiled = this.compileStage.compile(this.spec, workDir);
        if (isFailure(compiled)) {
            log.error('Compile failed', { message: compiled.message });
            discardIntermediates(this.spec.outDir, this.spec.packageName);
            return compiled;
        }

        setCorrelation({ stage: 'post-process' });
        const finished = this.postProcess.finish(compiled.path, this.spec.outDir, this.spec.packageName);
        if (isFailure(finished)) {
            log.error('Post-processing failed', { message: finished.message });
        }
        return finished;
    }
}
