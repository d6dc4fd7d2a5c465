import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { optionValue, optionValues, parseBackendSupport, parseBuildOptions } from '../src/cli';
import { OverlayConfigError } from '../src/structured_error';

describe('cli option parsing', () => {
    test('optionValue and optionValues read flags in order', () => {
        const args = ['--res', 'a', '--out', 'o', '--res', 'b'];
        assert.equal(optionValue(args, '--out'), 'o');
        assert.equal(optionValue(args, '--label'), undefined);
        assert.deepEqual(optionValues(args, '--res'), ['a', 'b']);
    });

    test('a flag without a value is an error', () => {
        assert.throws(() => optionValue(['--out'], '--out'), /--out requires a value/);
        assert.throws(() => optionValues(['--res', '--out', 'o'], '--res'), OverlayConfigError);
        assert.throws(() => optionValue(['--label', '--package', 'p'], '--label'), /--label requires a value/);
    });

    test('values that merely look like flags are accepted', () => {
        const args = ['--label', '--dark', '--meta', '--mode=night', '--meta', 'theme=--x'];
        assert.equal(optionValue(args, '--label'), '--dark');
        assert.deepEqual(optionValues(args, '--meta'), ['--mode=night', 'theme=--x']);
    });
});

describe('parseBuildOptions', () => {
    test('maps every build flag onto the overlay description', () => {
        const spec = parseBuildOptions([
            '--package', 'com.example.overlay',
            '--target', 'com.android.settings',
            '--out', '/tmp/overlays',
            '--res', '/src/res',
            '--res', '/src/res-night',
            '--assets', '/src/assets',
            '--base', '/data/app/settings.apk',
            '--label', 'Settings Night',
            '--version-code', '7',
            '--version-name', '1.7',
            '--meta', 'theme=night',
            '--meta', 'url=https://example.com/?a=b',
        ], () => 1234).build();

        assert.deepEqual(spec, {
            packageName: 'com.example.overlay',
            targetPackageName: 'com.android.settings',
            timestamp: 1234,
            versionCode: 7,
            versionName: '1.7',
            label: 'Settings Night',
            metadata: [['theme', 'night'], ['url', 'https://example.com/?a=b']],
            outDir: '/tmp/overlays',
            extraBasePackages: ['/data/app/settings.apk'],
            resourceDirs: ['/src/res', '/src/res-night'],
            assetDir: '/src/assets',
        });
    });

    test('an explicit timestamp wins over the clock', () => {
        const spec = parseBuildOptions(
            ['--package', 'p', '--target', 't', '--out', 'o', '--timestamp', '99'],
            () => 1
        ).build();
        assert.equal(spec.timestamp, 99);
        assert.equal(spec.outDir, path.resolve('o'));
    });

    test('rejects missing required flags and malformed values', () => {
        assert.throws(() => parseBuildOptions(['--target', 't', '--out', 'o']), /--package is required/);
        assert.throws(
            () => parseBuildOptions(['--package', 'p', '--target', 't', '--out', 'o', '--version-code', 'seven']),
            /--version-code must be an integer/
        );
        assert.throws(
            () => parseBuildOptions(['--package', 'p', '--target', 't', '--out', 'o', '--meta', 'novalue']),
            /--meta expects key=value/
        );
    });
});

describe('parseBackendSupport', () => {
    test('enables each named backend', () => {
        assert.deepEqual(parseBackendSupport(['--enable', 'root-modern', '--enable', 'vendor-app']), {
            'root-modern': true,
            'vendor-app': true,
        });
    });

    test('rejects unknown backend kinds', () => {
        assert.throws(() => parseBackendSupport(['--enable', 'magic']), /Unknown backend: magic/);
    });
});
