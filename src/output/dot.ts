/**
 * Graphviz dot renderer.
 */

import { GraphView, NodeKind, ViewEdge } from '../graph/types';

interface NodeStyle {
    shape: string;
    fill?: string;
}

const NODE_STYLES: Record<NodeKind, NodeStyle> = {
    file: { shape: 'box' },
    external: { shape: 'ellipse', fill: 'lightblue' },
    builtin: { shape: 'diamond', fill: 'gray' },
    folder: { shape: 'folder', fill: 'lightgrey' },
    asset: { shape: 'note', fill: 'yellow' },
    package: { shape: 'box3d', fill: 'orange' },
};

export function escapeLabel(label: string): string {
    return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function edgeLine(edge: ViewEdge): string {
    const attrs = edge.kind === 'sameAs' ? ' [style=dashed]' : '';
    return `    ${edge.from} -> ${edge.to}${attrs}\n`;
}

/**
 * Nodes are numbered by their view index; the root folder is labelled ".".
 */
export function renderDot(view: GraphView): string {
    let out = 'digraph {\n';
    for (const node of view.nodes) {
        const style = NODE_STYLES[node.kind];
        const label = escapeLabel(node.name === '' ? '.' : node.name);
        out += `    ${node.index} [label="${label}", shape=${style.shape}`;
        if (style.fill) {
            out += `, style=filled, fillcolor="${style.fill}"`;
        }
        out += ']\n';
    }
    for (const edge of view.edges) {
        out += edgeLine(edge);
    }
    out += '}\n';
    return out;
}
