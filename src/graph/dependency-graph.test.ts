import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import { namesOfKind } from '../test/helpers';
import { DependencyGraph } from './dependency-graph';
import { typeNodeName } from './types';

describe('DependencyGraph', () => {
    test('interning is idempotent per (name, kind)', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('react', 'external');
        const b = graph.intern('react', 'external');
        assert.equal(a, b);
        assert.equal(graph.outgoing(a).filter(e => e.kind === 'typeOf').length, 1);
    });

    test('same name, different kind gives distinct nodes', () => {
        const graph = new DependencyGraph();
        const file = graph.intern('lodash', 'file');
        const external = graph.intern('lodash', 'external');
        assert.notEqual(file, external);
        assert.equal(graph.kindOf(file), 'file');
        assert.equal(graph.kindOf(external), 'external');
    });

    test('files carry no classification edge', () => {
        const graph = new DependencyGraph();
        const id = graph.intern('src/a.ts', 'file');
        assert.deepEqual(graph.outgoing(id), []);
    });

    test('type nodes are named per kind and created once', () => {
        const graph = new DependencyGraph();
        graph.addTypeNodes();
        graph.addTypeNodes();
        assert.equal(graph.nodeCount, 5);
        const names = graph.typeNodeIds().map(id => graph.node(id)?.name).sort();
        assert.deepEqual(names, [
            typeNodeName('asset'),
            typeNodeName('builtin'),
            typeNodeName('external'),
            typeNodeName('folder'),
            typeNodeName('package'),
        ].sort());
        assert.equal(typeNodeName('builtin'), '__type__::builtin');
    });

    test('a file named like a type node is its own node', () => {
        const graph = new DependencyGraph();
        graph.addTypeNodes();
        const file = graph.intern('__type__::asset', 'file');
        assert.notEqual(file, graph.typeNode('asset'));
        assert.equal(graph.isTypeNode(file), false);
        assert.equal(graph.kindOf(file), 'file');
        assert.equal(graph.find('__type__::asset', 'file'), file);
        assert.equal(graph.nodeCount, 6);
    });

    test('kindOf takes the highest-precedence classification', () => {
        const graph = new DependencyGraph();
        const id = graph.intern('thing', 'asset');
        graph.classify(id, 'package');
        graph.classify(id, 'external');
        assert.equal(graph.kindOf(id), 'package');
    });

    test('duplicate edges are inserted once', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        const b = graph.intern('b.ts', 'file');
        assert.equal(graph.addEdge(a, b), true);
        assert.equal(graph.addEdge(a, b), false);
        assert.equal(graph.addEdge(a, b, 'sameAs'), true);
        assert.equal(graph.edgeCount, 2);
    });

    test('self-loops are allowed', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        assert.equal(graph.addEdge(a, a), true);
        assert.equal(graph.hasEdge(a, a), true);
    });

    test('edges need existing endpoints', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        assert.throws(() => graph.addEdge(a, 42), /does not exist/);
    });

    test('folder chains link every ancestor', () => {
        const graph = new DependencyGraph();
        const parent = graph.ensureFolders('src/parser/js/extract.ts');
        assert.equal(graph.node(parent)?.name, 'src/parser/js');
        assert.deepEqual(namesOfKind(graph, 'folder'), ['', 'src', 'src/parser', 'src/parser/js']);

        const root = graph.find('', 'folder');
        const src = graph.find('src', 'folder');
        const parser = graph.find('src/parser', 'folder');
        assert.ok(root !== undefined && src !== undefined && parser !== undefined);
        assert.equal(graph.hasEdge(root, src), true);
        assert.equal(graph.hasEdge(src, parser), true);
        assert.equal(graph.hasEdge(parser, parent), true);
    });

    test('a top-level file belongs to the root folder', () => {
        const graph = new DependencyGraph();
        assert.equal(graph.ensureFolders('index.ts'), graph.ensureRoot());
        assert.equal(graph.ensureFolder('.'), graph.ensureRoot());
    });

    test('removeNode drops every touching edge', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        const b = graph.intern('b.ts', 'file');
        const c = graph.intern('react', 'external');
        graph.addEdge(a, b);
        graph.addEdge(b, c);
        assert.equal(graph.removeNode(b), true);
        assert.equal(graph.removeNode(b), false);
        assert.equal(graph.find('b.ts', 'file'), undefined);
        assert.deepEqual(graph.outgoing(a), []);
        assert.deepEqual(graph.incoming(c), []);
        // only c's classification remains
        assert.equal(graph.edgeCount, 1);
    });

    test('incoming and outgoing', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        const b = graph.intern('b.ts', 'file');
        graph.addEdge(a, b);
        assert.deepEqual(graph.outgoing(a), [{ from: a, to: b, kind: 'regular' }]);
        assert.deepEqual(graph.incoming(b), [{ from: a, to: b, kind: 'regular' }]);
        assert.deepEqual(graph.incoming(a), []);
    });
});
