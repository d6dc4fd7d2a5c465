import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { BackendAlreadySelectedError, BackendCell } from '../src/backend/backend_cell';
import { CapabilityResolver, createBackend, currentBackend, getBackendResolver } from '../src/backend/capability_resolver';
import type { Environment } from '../src/backend/environment';
import type { BackendKind, BackendSupport } from '../src/backend/types';
import { COMPANION_ACCESS_PERMISSION } from '../src/config';

const ALL: BackendSupport = {
    'companion-samsung': true,
    companion: true,
    'system-service': true,
    'root-modern': true,
    'root-legacy': true,
    'vendor-app': true,
};

interface FakeEnvOptions {
    vendor?: 'generic' | 'samsung';
    osVersion?: number;
    companionReachable?: boolean;
    companionInitializes?: boolean;
    bridge?: boolean;
    root?: boolean;
    app?: boolean;
    granted?: string[];
}

function fakeEnv(o: FakeEnvOptions = {}) {
    const calls = { initializeCompanion: 0 };
    const env: Environment = {
        profile: { vendor: o.vendor ?? 'generic', synergy: false, osVersion: o.osVersion ?? 27 },
        companionReachable: () => o.companionReachable ?? false,
        initializeCompanion: () => {
            calls.initializeCompanion++;
            return o.companionInitializes ?? true;
        },
        systemServiceBridgePresent: () => o.bridge ?? false,
        rootAvailable: () => o.root ?? false,
        companionAppInstalled: () => o.app ?? false,
        permissionGranted: p => (o.granted ?? []).includes(p),
    };
    return { env, calls };
}

function resolvedKind(env: Environment, support: BackendSupport, granted = false): BackendKind | undefined {
    const resolver = new CapabilityResolver(env, { cell: new BackendCell() });
    if (granted) resolver.resolveWithGrantedPermissions(support);
    else resolver.resolve(support);
    return resolver.backend?.kind;
}

const everything: FakeEnvOptions = {
    vendor: 'samsung',
    osVersion: 27,
    companionReachable: true,
    bridge: true,
    root: true,
    app: true,
    granted: [COMPANION_ACCESS_PERMISSION],
};

describe('CapabilityResolver priority', () => {
    test('the highest priority satisfied backend wins', () => {
        assert.equal(resolvedKind(fakeEnv(everything).env, ALL), 'companion-samsung');
    });

    test('walks down the list as checks stop holding', () => {
        assert.equal(resolvedKind(fakeEnv({ ...everything, vendor: 'generic' }).env, ALL), 'companion');
        assert.equal(resolvedKind(fakeEnv({ ...everything, companionReachable: false }).env, ALL), 'system-service');
        assert.equal(resolvedKind(fakeEnv({ root: true, app: true, osVersion: 29 }).env, ALL), 'root-modern');
        assert.equal(resolvedKind(fakeEnv({ root: true, app: true, osVersion: 27 }).env, ALL), 'root-legacy');
        assert.equal(resolvedKind(fakeEnv({ app: true }).env, ALL), 'vendor-app');
    });

    test('companion backends need a pre-Pie OS', () => {
        assert.equal(resolvedKind(fakeEnv({ ...everything, osVersion: 28 }).env, ALL), 'system-service');
    });

    test('a failed companion handshake falls through', () => {
        const { env } = fakeEnv({ ...everything, companionInitializes: false });
        assert.equal(resolvedKind(env, ALL), 'system-service');
    });

    test('order of the support record does not change the outcome', () => {
        const support: BackendSupport = { 'vendor-app': true, 'root-legacy': true, 'system-service': true };
        assert.equal(resolvedKind(fakeEnv(everything).env, support), 'system-service');
    });

    test('disabled backends are never chosen even when satisfied', () => {
        assert.equal(resolvedKind(fakeEnv(everything).env, { 'vendor-app': true }), 'vendor-app');
    });

    test('returns false when nothing matches', () => {
        const resolver = new CapabilityResolver(fakeEnv().env, { cell: new BackendCell() });
        assert.equal(resolver.resolve(ALL), false);
        assert.equal(resolver.backend, undefined);
    });

    test('the companion handshake only runs when cheaper checks pass', () => {
        const { env, calls } = fakeEnv({ osVersion: 28, companionReachable: true, root: true });
        resolvedKind(env, ALL);
        assert.equal(calls.initializeCompanion, 0);
    });
});

describe('CapabilityResolver memoisation', () => {
    test('a second resolve keeps the first backend instance', () => {
        let created = 0;
        const resolver = new CapabilityResolver(fakeEnv({ root: true }).env, {
            cell: new BackendCell(),
            factories: {
                'root-legacy': () => {
                    created++;
                    return createBackend('root-legacy');
                },
            },
        });

        assert.equal(resolver.resolve(ALL), true);
        const first = resolver.backend;
        assert.equal(resolver.resolve(ALL), true);
        assert.equal(resolver.resolve({}), true);

        assert.equal(created, 1);
        assert.equal(resolver.backend, first);
    });

    test('resolvers sharing a cell share the selection', () => {
        const cell = new BackendCell();
        new CapabilityResolver(fakeEnv({ app: true }).env, { cell }).resolve(ALL);
        const later = new CapabilityResolver(fakeEnv({ root: true }).env, { cell });

        assert.equal(later.resolve(ALL), true);
        assert.equal(later.backend?.kind, 'vendor-app');
    });
});

describe('CapabilityResolver permission gate', () => {
    const noPermission: FakeEnvOptions = { ...everything, vendor: 'generic', bridge: false, granted: [] };

    test('the direct resolver ignores permissions', () => {
        assert.equal(resolvedKind(fakeEnv(noPermission).env, ALL), 'companion');
    });

    test('the permission-checked resolver skips to the next candidate', () => {
        assert.equal(resolvedKind(fakeEnv(noPermission).env, ALL, true), 'root-legacy');
    });

    test('granted permission keeps the companion backend', () => {
        const granted = { ...noPermission, granted: [COMPANION_ACCESS_PERMISSION] };
        assert.equal(resolvedKind(fakeEnv(granted).env, ALL, true), 'companion');
    });

    test('root backends are not gated', () => {
        const { env } = fakeEnv({ root: true, osVersion: 29 });
        assert.equal(resolvedKind(env, ALL, true), 'root-modern');
    });

    test('returns false when every candidate needs an ungranted permission', () => {
        const resolver = new CapabilityResolver(fakeEnv(noPermission).env, { cell: new BackendCell() });
        assert.equal(resolver.resolveWithGrantedPermissions({ companion: true, 'companion-samsung': true }), false);
    });
});

describe('BackendCell', () => {
    test('can only be set once', () => {
        const cell = new BackendCell();
        cell.set(createBackend('companion'));
        assert.throws(() => cell.set(createBackend('root-modern')), BackendAlreadySelectedError);
        assert.equal(cell.get()?.kind, 'companion');
    });

    test('refuses re-entrant selection from inside a factory', () => {
        const cell = new BackendCell();
        assert.throws(
            () => cell.withSelectionLock(() => {
                cell.withSelectionLock(() => createBackend('companion'));
                return createBackend('root-modern');
            }),
            /already in progress/
        );
        assert.equal(cell.isSet(), false);
    });
});

describe('process-wide resolver', () => {
    test('keeps the first selection for the life of the process', () => {
        assert.equal(currentBackend(), undefined);

        assert.equal(getBackendResolver(fakeEnv({ app: true }).env).resolve(ALL), true);
        assert.equal(currentBackend()?.kind, 'vendor-app');

        assert.equal(getBackendResolver(fakeEnv({ root: true }).env).resolve(ALL), true);
        assert.equal(currentBackend()?.kind, 'vendor-app');
    });
});
