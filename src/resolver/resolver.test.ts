import { strict as assert } from 'assert';
import { test, describe, after } from 'node:test';
import * as path from 'path';

import { createWorkspace } from '../test/helpers';
import { isBuiltin, stripNodeScheme } from './builtins';
import { ResolveContext, packageNameOf, probeFile, resolveAlias, resolveSpecifier } from './resolver';

describe('resolveSpecifier', () => {
    const ws = createWorkspace({
        'src/main.ts': '',
        'src/util.ts': '',
        'src/util/index.ts': '',
        'src/lib/index.js': '',
        'src/lib/helpers.tsx': '',
        'src/styles.css': '',
        'src/data.json': '',
        'src/both.js': '',
        'src/both.ts': '',
        'src/empty-dir/readme.md': '',
        'shared/format.ts': '',
    });
    const src = ws.file('src');
    const ctx: ResolveContext = {
        root: ws.root,
        aliases: [
            { prefix: '@shared', target: ws.file('shared') },
            { prefix: '@missing', target: ws.file('nowhere') },
        ],
        workspacePackages: new Set(['@acme/ui', 'core']),
    };

    after(() => ws.cleanup());

    test('extension probe beats index probe', () => {
        assert.deepEqual(resolveSpecifier('./util', src, ctx), { name: 'src/util.ts', kind: 'file' });
    });

    test('extensions are probed in order', () => {
        assert.deepEqual(resolveSpecifier('./both', src, ctx), { name: 'src/both.js', kind: 'file' });
    });

    test('directory resolves through its index file', () => {
        assert.deepEqual(resolveSpecifier('./lib', src, ctx), { name: 'src/lib/index.js', kind: 'file' });
        assert.deepEqual(resolveSpecifier('./util/', src, ctx), { name: 'src/util/index.ts', kind: 'file' });
    });

    test('exact file path with extension', () => {
        assert.deepEqual(resolveSpecifier('./lib/helpers.tsx', src, ctx), { name: 'src/lib/helpers.tsx', kind: 'file' });
    });

    test('non-source files are assets', () => {
        assert.deepEqual(resolveSpecifier('./styles.css', src, ctx), { name: 'src/styles.css', kind: 'asset' });
        assert.deepEqual(resolveSpecifier('../src/data.json', src, ctx), { name: 'src/data.json', kind: 'asset' });
    });

    test('unresolvable relative specifiers are dropped', () => {
        assert.equal(resolveSpecifier('./nope', src, ctx), null);
        assert.equal(resolveSpecifier('./empty-dir', src, ctx), null);
        assert.equal(resolveSpecifier('./styles', src, ctx), null);
    });

    test('targets outside the root are dropped', () => {
        const outside = createWorkspace({ 'x.ts': '' });
        try {
            const specifier = path.relative(src, outside.file('x.ts')).split(path.sep).join('/');
            assert.equal(resolveSpecifier(specifier, src, ctx), null);
        } finally {
            outside.cleanup();
        }
    });

    test('aliases resolve like relative paths', () => {
        assert.deepEqual(resolveSpecifier('@shared/format', src, ctx), { name: 'shared/format.ts', kind: 'file' });
    });

    test('an alias and a relative path reach the same name', () => {
        const viaAlias = resolveSpecifier('@shared/format', src, ctx);
        const viaRelative = resolveSpecifier('../shared/format', src, ctx);
        assert.deepEqual(viaAlias, viaRelative);
    });

    test('a failed alias falls through to external', () => {
        assert.deepEqual(resolveSpecifier('@missing/thing', src, ctx), { name: '@missing/thing', kind: 'external' });
        assert.deepEqual(resolveSpecifier('@shared/nothing', src, ctx), { name: '@shared/nothing', kind: 'external' });
    });

    test('files outside the walked set resolve to nothing', () => {
        const walked: ResolveContext = { ...ctx, knownFiles: new Set(['src/main.ts', 'src/util/index.ts']) };
        assert.equal(resolveSpecifier('./util', src, walked), null);
        assert.equal(resolveSpecifier('./styles.css', src, walked), null);
        assert.equal(resolveSpecifier('@shared/format', src, walked), null);
        assert.deepEqual(resolveSpecifier('./util/', src, walked), { name: 'src/util/index.ts', kind: 'file' });
        assert.deepEqual(resolveSpecifier('@shared/nothing', src, walked), { name: '@shared/nothing', kind: 'external' });
    });

    test('builtins lose the node: scheme', () => {
        assert.deepEqual(resolveSpecifier('node:fs', src, ctx), { name: 'fs', kind: 'builtin' });
        assert.deepEqual(resolveSpecifier('path', src, ctx), { name: 'path', kind: 'builtin' });
        assert.deepEqual(resolveSpecifier('fs/promises', src, ctx), { name: 'fs/promises', kind: 'builtin' });
        assert.deepEqual(resolveSpecifier('node:test', src, ctx), { name: 'test', kind: 'builtin' });
    });

    test('workspace packages by package name', () => {
        assert.deepEqual(resolveSpecifier('core', src, ctx), { name: 'core', kind: 'package' });
        assert.deepEqual(resolveSpecifier('core/utils', src, ctx), { name: 'core', kind: 'package' });
        assert.deepEqual(resolveSpecifier('@acme/ui/button', src, ctx), { name: '@acme/ui', kind: 'package' });
    });

    test('anything else is external, named as written', () => {
        assert.deepEqual(resolveSpecifier('react', src, ctx), { name: 'react', kind: 'external' });
        assert.deepEqual(resolveSpecifier('lodash/fp', src, ctx), { name: 'lodash/fp', kind: 'external' });
    });
});

describe('resolveAlias', () => {
    const ws = createWorkspace({ 'lib/a.ts': '', 'lib/index.ts': '' });
    after(() => ws.cleanup());

    test('exact prefix resolves the target itself', () => {
        const aliases = [{ prefix: '@lib', target: ws.file('lib') }];
        assert.equal(resolveAlias('@lib', aliases), ws.file('lib/index.ts'));
        assert.equal(resolveAlias('@lib/a', aliases), ws.file('lib/a.ts'));
    });

    test('prefix must end at a path boundary', () => {
        const aliases = [{ prefix: '@lib', target: ws.file('lib') }];
        assert.equal(resolveAlias('@library/a', aliases), null);
    });

    test('first matching alias with a hit wins', () => {
        const aliases = [
            { prefix: '@x', target: ws.file('missing') },
            { prefix: '@x', target: ws.file('lib') },
        ];
        assert.equal(resolveAlias('@x/a', aliases), ws.file('lib/a.ts'));
    });
});

describe('helpers', () => {
    test('packageNameOf handles scopes and subpaths', () => {
        assert.equal(packageNameOf('react'), 'react');
        assert.equal(packageNameOf('react-dom/client'), 'react-dom');
        assert.equal(packageNameOf('@scope/pkg/deep/path'), '@scope/pkg');
        assert.equal(packageNameOf('@scope'), '@scope');
    });

    test('isBuiltin and stripNodeScheme', () => {
        assert.equal(isBuiltin('crypto'), true);
        assert.equal(isBuiltin('node:crypto'), true);
        assert.equal(isBuiltin('react'), false);
        assert.equal(stripNodeScheme('node:url'), 'url');
        assert.equal(stripNodeScheme('url'), 'url');
    });

    test('probeFile does not add extensions to a specifier that has one', () => {
        const ws = createWorkspace({ 'a.config.ts': '' });
        try {
            assert.equal(probeFile(ws.file('a.config'), './a.config'), null);
            assert.equal(probeFile(ws.file('a'), './a'), null);
        } finally {
            ws.cleanup();
        }
    });

    test('"." and ".." go to the index file, never a sibling file', () => {
        const ws = createWorkspace({ 'pkg/index.js': '', 'pkg/sub/x.js': '', 'pkg.js': '' });
        const ctx: ResolveContext = { root: ws.root, aliases: [], workspacePackages: new Set() };
        try {
            assert.equal(probeFile(ws.file('pkg'), '.'), ws.file('pkg/index.js'));
            assert.deepEqual(resolveSpecifier('..', ws.file('pkg/sub'), ctx), { name: 'pkg/index.js', kind: 'file' });
            assert.deepEqual(resolveSpecifier('../../pkg', ws.file('pkg/sub'), ctx), { name: 'pkg.js', kind: 'file' });
        } finally {
            ws.cleanup();
        }
    });
});
