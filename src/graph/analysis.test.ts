import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import { INCLUDE_ALL, countByKind, filterGraph, pruneUnconnected } from './analysis';
import { DependencyGraph } from './dependency-graph';

function sampleGraph(): DependencyGraph {
    const graph = new DependencyGraph();
    graph.addTypeNodes();
    const main = graph.intern('src/main.ts', 'file');
    const util = graph.intern('src/util.ts', 'file');
    const react = graph.intern('react', 'external');
    const fs = graph.intern('fs', 'builtin');
    const css = graph.intern('src/app.css', 'asset');
    const src = graph.ensureFolders('src/main.ts');
    graph.addEdge(main, util);
    graph.addEdge(main, react);
    graph.addEdge(util, fs);
    graph.addEdge(main, css);
    graph.addEdge(src, main, 'sameAs');
    return graph;
}

function viewNames(graph: DependencyGraph, include = INCLUDE_ALL, ignore: string[] = []): string[] {
    return filterGraph(graph, include, ignore).nodes.map(n => n.name).sort();
}

describe('pruneUnconnected', () => {
    test('removes nodes that have only their classification', () => {
        const graph = sampleGraph();
        graph.intern('lonely.ts', 'file');
        graph.intern('unused', 'external');
        assert.equal(pruneUnconnected(graph), 2);
        assert.equal(graph.find('lonely.ts', 'file'), undefined);
        assert.equal(graph.find('unused', 'external'), undefined);
        assert.notEqual(graph.find('react', 'external'), undefined);
    });

    test('is idempotent', () => {
        const graph = sampleGraph();
        graph.intern('lonely.ts', 'file');
        pruneUnconnected(graph);
        const nodes = graph.nodeCount;
        const edges = graph.edgeCount;
        assert.equal(pruneUnconnected(graph), 0);
        assert.equal(graph.nodeCount, nodes);
        assert.equal(graph.edgeCount, edges);
    });

    test('type nodes survive even when nothing points at them', () => {
        const graph = new DependencyGraph();
        graph.addTypeNodes();
        assert.equal(pruneUnconnected(graph), 0);
        assert.equal(graph.typeNodeIds().length, 5);
    });

    test('a self-loop counts as a connection', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        graph.addEdge(a, a);
        assert.equal(pruneUnconnected(graph), 0);
    });

    test('a node left without edges is pruned', () => {
        const graph = new DependencyGraph();
        const a = graph.intern('a.ts', 'file');
        const b = graph.intern('b.ts', 'file');
        graph.addEdge(a, b);
        graph.removeNode(a);
        assert.equal(pruneUnconnected(graph), 1);
        assert.equal(graph.nodeCount, 0);
    });
});

describe('filterGraph', () => {
    test('everything included: no type nodes, no typeOf edges', () => {
        const graph = sampleGraph();
        assert.deepEqual(viewNames(graph), ['', 'fs', 'react', 'src', 'src/app.css', 'src/main.ts', 'src/util.ts']);
        const view = filterGraph(graph, INCLUDE_ALL);
        assert.ok(view.edges.every(e => e.kind === 'regular' || e.kind === 'sameAs'));
        // 4 imports, root -> src, src -sameAs-> main.ts
        assert.equal(view.edges.length, 6);
    });

    test('disabled kinds and their edges disappear', () => {
        const graph = sampleGraph();
        const include = { ...INCLUDE_ALL, external: false, builtins: false, folders: false };
        const view = filterGraph(graph, include);
        assert.deepEqual(view.nodes.map(n => n.name).sort(), ['src/app.css', 'src/main.ts', 'src/util.ts']);
        assert.deepEqual(
            view.edges.map(e => `${view.nodes[e.from]?.name} -> ${view.nodes[e.to]?.name}`).sort(),
            ['src/main.ts -> src/app.css', 'src/main.ts -> src/util.ts']
        );
    });

    test('files are kept with every flag off', () => {
        const graph = sampleGraph();
        const none = { external: false, builtins: false, folders: false, assets: false, packages: false };
        assert.deepEqual(viewNames(graph, none), ['src/main.ts', 'src/util.ts']);
    });

    test('ignored names are removed with their edges', () => {
        const graph = sampleGraph();
        const view = filterGraph(graph, INCLUDE_ALL, ['src/util.ts', 'react']);
        const names = view.nodes.map(n => n.name);
        assert.equal(names.includes('src/util.ts'), false);
        assert.equal(names.includes('react'), false);
        assert.equal(names.includes('fs'), true);
        assert.ok(view.edges.every(e => view.nodes[e.from] !== undefined && view.nodes[e.to] !== undefined));
    });

    test('view indices are dense and the source graph is untouched', () => {
        const graph = sampleGraph();
        const before = graph.nodeCount;
        const view = filterGraph(graph, { ...INCLUDE_ALL, folders: false });
        view.nodes.forEach((node, i) => assert.equal(node.index, i));
        assert.equal(graph.nodeCount, before);
    });
});

describe('countByKind', () => {
    test('counts nodes per kind and edges by source kind', () => {
        const counts = countByKind(filterGraph(sampleGraph(), INCLUDE_ALL));
        assert.deepEqual(counts.file, { nodes: 2, edges: 4 });
        assert.deepEqual(counts.external, { nodes: 1, edges: 0 });
        assert.deepEqual(counts.builtin, { nodes: 1, edges: 0 });
        assert.deepEqual(counts.asset, { nodes: 1, edges: 0 });
        assert.deepEqual(counts.folder, { nodes: 2, edges: 2 });
        assert.deepEqual(counts.package, { nodes: 0, edges: 0 });
    });
});
