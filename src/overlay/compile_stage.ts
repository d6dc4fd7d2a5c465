// src/overlay/compile_stage.ts
//
// Drives the resource compiler. Modern aapt rejects some resource types
// that older encodings accept ("types not allowed"); when that happens the
// build is retried once in legacy mode, which drops the extra base packages.
// Physical compiler runs per build: at most 2.

import * as fs from 'fs';
import * as path from 'path';
import { COMPILER, FRAMEWORK_RES_PATH, MANIFEST } from '../config';
import { createLogger } from '../logger';
import { errorMessage } from '../structured_error';
import type { PreferenceStore } from '../preferences';
import type { ToolInvoker } from '../tool_invoker';
import { failure, success, type OverlayArtifactPaths, type OverlaySpec, type Result } from './types';

const log = createLogger('compile');

export function artifactPaths(outDir: string, packageName: string): OverlayArtifactPaths {
    return {
        unsigned: path.join(outDir, `${packageName}-unsigned.apk`),
        aligned: path.join(outDir, `${packageName}-unsigned-aligned.apk`),
        signed: path.join(outDir, `${packageName}.apk`),
    };
}

export interface CompileStageOptions {
    invoker: ToolInvoker;
    preferences: PreferenceStore;
    /** Resolved path of the aapt binary */
    compilerPath: string;
    frameworkResPath?: string;
}

/** Transient state of one compile call. */
interface CompilerInvocationState {
    legacyModeActive: boolean;
    attempts: number;
}

interface StderrVerdict {
    errors: string[];
    switchToLegacy: boolean;
}

function ensureDirectory(dir: string): boolean {
    if (fs.existsSync(dir)) return fs.statSync(dir).isDirectory();
    try {
        fs.mkdirSync(dir, { recursive: true });
        return true;
    } catch (e) {
        log.error(`Cannot create output directory ${dir}`, { error: errorMessage(e) });
        return false;
    }
}

export class CompileStage {
    private readonly invoker: ToolInvoker;
    private readonly preferences: PreferenceStore;
    private readonly compilerPath: string;
    private readonly frameworkResPath: string;

    constructor(options: CompileStageOptions) {
        this.invoker = options.invoker;
        this.preferences = options.preferences;
        this.compilerPath = options.compilerPath;
        this.frameworkResPath = options.frameworkResPath ?? FRAMEWORK_RES_PATH;
    }

    buildArguments(spec: OverlaySpec, workDir: string, legacy: boolean): string[] {
        const unsigned = artifactPaths(spec.outDir, spec.packageName).unsigned;
        const args = ['p', '-M', path.join(workDir, MANIFEST.FILE_NAME)];

        for (const dir of spec.resourceDirs) {
            args.push('-S', dir);
        }
        if (spec.assetDir) {
            args.push('-A', spec.assetDir);
        }

        args.push('-I', this.frameworkResPath);
        if (!legacy) {
            for (const basePackage of spec.extraBasePackages) {
                if (fs.existsSync(basePackage)) {
                    args.push('-I', basePackage);
                } else {
                    log.debug(`Skipping missing base package ${basePackage}`);
                }
            }
        }

        args.push('-F', unsigned, '--auto-add-overlay', '-f');
        return args;
    }

    private classifyStderr(lines: readonly string[], state: CompilerInvocationState): StderrVerdict {
        const errors: string[] = [];
        let switchToLegacy = false;

        for (const line of lines) {
            if (line.includes(COMPILER.LEGACY_MARKER)) {
                const forceNewCompiler = this.preferences.getBoolean(COMPILER.FORCE_NEW_COMPILER_PREF, false);
                if (!state.legacyModeActive && !forceNewCompiler) {
                    switchToLegacy = true;
                    continue;
                }
            }
            errors.push(line);
        }

        return { errors, switchToLegacy };
    }

    compile(spec: OverlaySpec, workDir: string): Result {
        const { unsigned } = artifactPaths(spec.outDir, spec.packageName);

        if (!ensureDirectory(spec.outDir)) {
            return failure('Failed to create overlay cache directory', 'CONFIG_ERROR');
        }
        if (spec.resourceDirs.length === 0) {
            return failure('Resource directory cannot be empty!', 'CONFIG_ERROR');
        }

        // A leftover archive from an earlier build would satisfy the integrity check below
        fs.rmSync(unsigned, { force: true });

        const state: CompilerInvocationState = { legacyModeActive: false, attempts: 0 };

        while (true) {
            state.attempts++;
            const args = this.buildArguments(spec, workDir, state.legacyModeActive);
            log.info(`Compiling overlay (attempt ${state.attempts}${state.legacyModeActive ? ', legacy mode' : ''})`);

            const run = this.invoker.run(this.compilerPath, args);
            if (run.exitCode === null) {
                return failure(run.stderrLines.join('\n') || `Failed to run ${this.compilerPath}`, 'TOOL_ERROR');
            }

            const verdict = this.classifyStderr(run.stderrLines, state);
            if (verdict.switchToLegacy) {
                log.warn('Compiler rejected resource types, retrying in legacy mode', {
                    discarded_errors: verdict.errors.length,
                });
                state.legacyModeActive = true;
                continue;
            }

            if (verdict.errors.length > 0) {
                return failure(verdict.errors.join('\n'), 'COMPILER_ERROR');
            }
            break;
        }

        if (!fs.existsSync(unsigned) || !fs.statSync(unsigned).isFile()) {
            return failure('Failed to compile overlay', 'INTEGRITY_ERROR');
        }

        log.info('Overlay compiled', { unsigned, attempts: state.attempts, legacy: state.legacyModeActive });
        return success(unsigned);
    }
}
