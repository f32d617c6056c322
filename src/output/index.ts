import { GraphView } from '../graph/types';
import { renderDot } from './dot';
import { renderJson } from './json';

export const OUTPUT_FORMATS = ['dot', 'json'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export function render(view: GraphView, format: OutputFormat): string {
    return format === 'json' ? renderJson(view) : renderDot(view);
}

export { renderDot, escapeLabel } from './dot';
export { renderJson, toJsonGraph } from './json';
export type { JsonGraph } from './json';
