#!/usr/bin/env node
/**
 * CLI Entry Point for overlay-forge
 */

import { PREFERENCES_DB } from './config';
import { CapabilityResolver, createProcessEnvironment, isBackendKind, BACKEND_PRIORITY, type BackendSupport } from './backend';
import { OverlayPipeline, OverlaySpecBuilder, defaultPlatformProfile, isSuccess } from './overlay';
import { SqlitePreferenceStore } from './preferences';
import { OverlayConfigError, createStructuredError, errorMessage } from './structured_error';

/** Every flag the CLI accepts; only these are refused as a flag's value. */
export const KNOWN_FLAGS: ReadonlySet<string> = new Set([
    '--package', '--target', '--out', '--res', '--assets', '--base', '--label',
    '--version-code', '--version-name', '--meta', '--timestamp',
    '--enable', '--granted', '--granted-only',
]);

/** Value following `flag`, or undefined when the flag is absent. Throws when the flag has no value. */
export function optionValue(args: readonly string[], flag: string): string | undefined {
    const index = args.indexOf(flag);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || KNOWN_FLAGS.has(value)) {
        throw new OverlayConfigError(`${flag} requires a value`);
    }
    return value;
}

/** Every value given for a repeatable flag, in order. */
export function optionValues(args: readonly string[], flag: string): string[] {
    const values: string[] = [];
    for (let i = 0; i < args.length; i++) {
        if (args[i] !== flag) continue;
        const value = args[i + 1];
        if (value === undefined || KNOWN_FLAGS.has(value)) {
            throw new OverlayConfigError(`${flag} requires a value`);
        }
        values.push(value);
        i++;
    }
    return values;
}

function requiredOption(args: readonly string[], flag: string): string {
    const value = optionValue(args, flag);
    if (value === undefined) throw new OverlayConfigError(`${flag} is required`);
    return value;
}

function intOption(args: readonly string[], flag: string): number | undefined {
    const raw = optionValue(args, flag);
    if (raw === undefined) return undefined;
    if (!/^-?\d+$/.test(raw)) throw new OverlayConfigError(`${flag} must be an integer, got ${raw}`);
    return parseInt(raw, 10);
}

function parseMeta(entry: string): [string, string] {
    const eq = entry.indexOf('=');
    if (eq <= 0) throw new OverlayConfigError(`--meta expects key=value, got ${entry}`);
    return [entry.slice(0, eq), entry.slice(eq + 1)];
}

/** Turns `build` arguments into an OverlaySpec builder. */
export function parseBuildOptions(args: readonly string[], now: () => number = Date.now): OverlaySpecBuilder {
    const builder = new OverlaySpecBuilder({
        packageName: requiredOption(args, '--package'),
        targetPackageName: requiredOption(args, '--target'),
        timestamp: intOption(args, '--timestamp') ?? now(),
        versionCode: intOption(args, '--version-code'),
        versionName: optionValue(args, '--version-name'),
        label: optionValue(args, '--label'),
        metadata: optionValues(args, '--meta').map(parseMeta),
        outDir: requiredOption(args, '--out'),
    });

    for (const dir of optionValues(args, '--res')) builder.addResourceDir(dir);
    for (const base of optionValues(args, '--base')) builder.addExtraBasePackage(base);
    const assets = optionValue(args, '--assets');
    if (assets !== undefined) builder.setAssetDir(assets);
    return builder;
}

/** `--enable` values as a support record; unknown kinds are rejected. */
export function parseBackendSupport(args: readonly string[]): BackendSupport {
    const support: BackendSupport = {};
    for (const kind of optionValues(args, '--enable')) {
        if (!isBackendKind(kind)) {
            throw new OverlayConfigError(`Unknown backend: ${kind} (valid: ${BACKEND_PRIORITY.join(', ')})`);
        }
        support[kind] = true;
    }
    return support;
}

class OverlayForgeCLI {
    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        try {
            switch (command) {
                case 'build':
                    this.runBuild(rest);
                    break;
                case 'backend':
                    this.runBackend(rest);
                    break;
                case 'prefs':
                    this.runPrefs(rest);
                    break;
                default:
                    this.showHelp();
            }
        } catch (e) {
            if (!(e instanceof OverlayConfigError)) throw e;
            console.error(`Error: ${e.message}`);
            process.exitCode = 1;
        }
    }

    private runBuild(args: string[]): void {
        const spec = parseBuildOptions(args).build();
        const prefs = new SqlitePreferenceStore(PREFERENCES_DB);
        try {
            const result = new OverlayPipeline(spec, { preferences: prefs }).exec();
            if (isSuccess(result)) {
                console.log(result.path);
                return;
            }

            const report = createStructuredError(result.code, result.message, { package: spec.packageName });
            console.error(`Error [${report.code}]: ${report.message}`);
            for (const hint of report.recovery_hints) {
                console.error(`  - ${hint.description}`);
            }
            process.exitCode = 1;
        } finally {
            prefs.close();
        }
    }

    private runBackend(args: string[]): void {
        const support = parseBackendSupport(args);
        const env = createProcessEnvironment({
            profile: defaultPlatformProfile(),
            grantedPermissions: optionValues(args, '--granted'),
        });
        const resolver = new CapabilityResolver(env);
        const ok = args.includes('--granted-only')
            ? resolver.resolveWithGrantedPermissions(support)
            : resolver.resolve(support);

        if (!ok || resolver.backend === undefined) {
            console.log('unsupported device');
            process.exitCode = 1;
            return;
        }
        console.log(resolver.backend.kind);
    }

    private runPrefs(args: string[]): void {
        const [action, key, value] = args;
        if ((action !== 'get' && action !== 'set') || !key) {
            throw new OverlayConfigError('Usage: overlay-forge prefs get|set <key> [true|false]');
        }

        const prefs = new SqlitePreferenceStore(PREFERENCES_DB);
        try {
            if (action === 'get') {
                console.log(String(prefs.getBoolean(key, false)));
                return;
            }
            if (value !== 'true' && value !== 'false') {
                throw new OverlayConfigError('prefs set expects true or false');
            }
            prefs.setBoolean(key, value === 'true');
            console.log(`${key}=${value}`);
        } finally {
            prefs.close();
        }
    }

    private showHelp(): void {
        console.log(`
overlay-forge - build signed resource overlays

USAGE:
  overlay-forge <command> [options]

COMMANDS:
  build     Compile, align and sign an overlay
              --package <name> --target <name> --out <dir> --res <dir>...
              [--assets <dir>] [--base <apk>]... [--label <text>]
              [--version-code <n>] [--version-name <text>] [--meta key=value]...
              [--timestamp <epoch-ms>]
  backend   Print the backend this device would use
              --enable <kind>... [--granted <permission>]... [--granted-only]
              kinds: ${BACKEND_PRIORITY.join(', ')}
  prefs     get|set <key> [true|false]   (e.g. force_new_compiler)
  help      Show this help

ENVIRONMENT:
  OVERLAY_AAPT, OVERLAY_ZIPALIGN, OVERLAY_APKSIGNER   tool paths
  OVERLAY_KEYSTORE, OVERLAY_KEYSTORE_PASS, OVERLAY_KEY_ALIAS
  OVERLAY_VENDOR, OVERLAY_SYNERGY, OVERLAY_OS_VERSION  device profile
  OVERLAY_LOG_LEVEL, OVERLAY_LOG_JSON, OVERLAY_LOG_FILE
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new OverlayForgeCLI();
    cli.run(process.argv).catch((err: unknown) => {
        console.error('Fatal error:', errorMessage(err));
        process.exit(1);
    });
}

export { OverlayForgeCLI };
