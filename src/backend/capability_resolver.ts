// src/backend/capability_resolver.ts
//
// Picks the backend used to install overlays. Checks run strictly in
// BACKEND_PRIORITY order and the first enabled, satisfied one wins; a later
// check never overrides an earlier match. The choice is kept for the life
// of the cell (process-wide by default).

import { COMPANION_ACCESS_PERMISSION, SDK_LEVELS } from '../config';
import { createLogger } from '../logger';
import { BackendCell, processBackendCell } from './backend_cell';
import type { Environment } from './environment';
import type { Backend, BackendFactory, BackendKind, BackendSupport, CapabilityCheck } from './types';

const log = createLogger('backend');

export function createBackend(kind: BackendKind): Backend {
    return Object.freeze({ kind });
}

export interface CapabilityResolverOptions {
    cell?: BackendCell;
    factories?: Partial<Record<BackendKind, BackendFactory>>;
}

export class CapabilityResolver {
    private readonly cell: BackendCell;
    private readonly factories: Partial<Record<BackendKind, BackendFactory>>;

    constructor(private readonly env: Environment, options: CapabilityResolverOptions = {}) {
        this.cell = options.cell ?? processBackendCell;
        this.factories = options.factories ?? {};
    }

    get backend(): Backend | undefined {
        return this.cell.get();
    }

    private factoryFor(kind: BackendKind): BackendFactory {
        return this.factories[kind] ?? (() => createBackend(kind));
    }

    /** The capability checks in priority order. Predicates short-circuit left to right. */
    checks(support: BackendSupport): CapabilityCheck[] {
        const env = this.env;
        const { vendor, osVersion } = env.profile;
        const beforePie = osVersion < SDK_LEVELS.PIE;

        const companionReady = () => beforePie && env.companionReachable() && env.initializeCompanion();

        const check = (
            name: BackendKind,
            predicate: () => boolean,
            requiredPermission?: string
        ): CapabilityCheck => ({
            name,
            enabled: support[name] === true,
            predicate,
            factory: this.factoryFor(name),
            requiredPermission,
        });

        return [
            check('companion-samsung', () => vendor === 'samsung' && companionReady(), COMPANION_ACCESS_PERMISSION),
            check('companion', companionReady, COMPANION_ACCESS_PERMISSION),
            check('system-service', () => env.systemServiceBridgePresent()),
            check('root-modern', () => env.rootAvailable() && !beforePie),
            check('root-legacy', () => env.rootAvailable() && beforePie),
            check('vendor-app', () => env.companionAppInstalled()),
        ];
    }

    /** Selects a backend; true when one is (or already was) selected. */
    resolve(support: BackendSupport): boolean {
        return this.select(support, false);
    }

    /**
     * Like resolve(), but a backend whose permission is not granted yet is
     * skipped in favour of the next candidate. Never asks for the permission.
     */
    resolveWithGrantedPermissions(support: BackendSupport): boolean {
        return this.select(support, true);
    }

    private select(support: BackendSupport, requireGranted: boolean): boolean {
        const selected = this.cell.withSelectionLock(() => {
            for (const c of this.checks(support)) {
                if (!c.enabled || !c.predicate()) continue;
                if (requireGranted && c.requiredPermission && !this.env.permissionGranted(c.requiredPermission)) {
                    log.info(`Skipping ${c.name}: ${c.requiredPermission} not granted`);
                    continue;
                }
                log.info(`Selected backend ${c.name}`);
                return c.factory();
            }
            return undefined;
        });

        if (selected === undefined) {
            log.warn('No supported backend found', { support });
            return false;
        }
        return true;
    }
}

/** Resolver bound to the process-wide backend slot. */
export function getBackendResolver(env: Environment): CapabilityResolver {
    return new CapabilityResolver(env, { cell: processBackendCell });
}

export function currentBackend(): Backend | undefined {
    return processBackendCell.get();
}
