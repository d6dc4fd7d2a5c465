// src/overlay/post_process.ts

import * as fs from 'fs';
import { COMPILER, SIGNING } from '../config';
import { createLogger } from '../logger';
import { errorMessage } from '../structured_error';
import type { ToolInvoker } from '../tool_invoker';
import { publishFileSync, tempPathFor } from './atomic_publish';
import { artifactPaths } from './compile_stage';
import { failure, success, type Result } from './types';

const log = createLogger('post-process');

export interface ApkSigner {
    /** Signs `input` into `output`; returns false when signing failed. */
    sign(input: string, output: string): boolean;
}

export interface SigningKey {
    keystorePath: string;
    keystorePassword: string;
    keyAlias?: string;
}

/**
 * Signs with `apksigner` into a temp file beside the destination, then
 * publishes it with a rename.
 */
export class ToolApkSigner implements ApkSigner {
    constructor(
        private readonly invoker: ToolInvoker,
        private readonly signerPath: string,
        private readonly key: SigningKey = {
            keystorePath: SIGNING.KEYSTORE,
            keystorePassword: SIGNING.KEYSTORE_PASS,
            keyAlias: SIGNING.KEY_ALIAS || undefined,
        }
    ) {}

    sign(input: string, output: string): boolean {
        const tmp = tempPathFor(output);
        // The password travels in the child's environment, never in argv.
        const args = ['sign', '--ks', this.key.keystorePath, '--ks-pass', `env:${SIGNING.PASSWORD_ENV_VAR}`];
        if (this.key.keyAlias) args.push('--ks-key-alias', this.key.keyAlias);
        args.push('--out', tmp, input);

        const run = this.invoker.run(this.signerPath, args, {
            env: { [SIGNING.PASSWORD_ENV_VAR]: this.key.keystorePassword },
        });
        if (run.exitCode !== 0 || !fs.existsSync(tmp)) {
            log.error('Signer failed', { exit_code: run.exitCode, stderr: run.stderrLines.slice(-5) });
            fs.rmSync(tmp, { force: true });
            return false;
        }

        const warnings: string[] = [];
        try {
            publishFileSync({ tmpPath: tmp, finalPath: output, mode: 0o644, fsyncMode: 'BEST_EFFORT', warnings });
        } catch (e) {
            log.error(`Cannot publish signed overlay: ${errorMessage(e)}`);
            return false;
        }
        for (const w of warnings) log.warn(w);
        return true;
    }
}

export interface PostProcessStageOptions {
    invoker: ToolInvoker;
    /** Resolved path of the zipalign binary */
    alignerPath: string;
    signer: ApkSigner;
}

export class PostProcessStage {
    private readonly invoker: ToolInvoker;
    private readonly alignerPath: string;
    private readonly signer: ApkSigner;

    constructor(options: PostProcessStageOptions) {
        this.invoker = options.invoker;
        this.alignerPath = options.alignerPath;
        this.signer = options.signer;
    }

    finish(unsignedPath: string, outDir: string, packageName: string): Result {
        const { aligned, signed } = artifactPaths(outDir, packageName);
        try {
            return this.alignAndSign(unsignedPath, aligned, signed);
        } finally {
            removeIntermediate(unsignedPath);
            removeIntermediate(aligned);
        }
    }

    private alignAndSign(unsigned: string, aligned: string, signed: string): Result {
        fs.rmSync(aligned, { force: true });
        this.invoker.run(this.alignerPath, ['-f', String(COMPILER.ZIPALIGN_BOUNDARY), unsigned, aligned]);
        if (!fs.existsSync(aligned)) {
            return failure('Failed to zipalign overlay', 'POSTPROCESS_ERROR');
        }

        if (!this.signer.sign(aligned, signed)) {
            return failure('Failed to sign overlay', 'POSTPROCESS_ERROR');
        }

        log.info('Overlay signed', { path: signed });
        return success(signed);
    }
}

/** Best-effort removal of the unsigned and aligned archives of a build. */
export function discardIntermediates(outDir: string, packageName: string): void {
    const { unsigned, aligned } = artifactPaths(outDir, packageName);
    removeIntermediate(unsigned);
    removeIntermediate(aligned);
}

function removeIntermediate(p: string): void {
    try {
        fs.rmSync(p, { force: true });
    } catch (e) {
        log.warn(`Could not delete intermediate ${p}: ${errorMessage(e)}`);
    }
}
