import { Settings } from './settings';
import { BoundingBox, BoundsWarning, FlatSubpath, MotionCommand, MotionKind, ToolpathDocument, Vertex } from './types';

type Templates = Pick<Settings, 'preamble' | 'postamble' | 'travelTemplate' | 'drawTemplate' | 'engageTemplate' | 'disengageTemplate' | 'precision'>;

type CommandTemplate = 'travelTemplate' | 'engageTemplate' | 'drawTemplate' | 'disengageTemplate';

const TEMPLATE_FOR: Record<MotionKind, CommandTemplate> = {
    travel: 'travelTemplate',
    engage: 'engageTemplate',
    draw: 'drawTemplate',
    disengage: 'disengageTemplate',
};

function boundingBoxOf(targets: Vertex<'device'>[]): BoundingBox | null {
    if (targets.length === 0) return null;
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const p of targets) {
        if (p.x < minX) minX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.x > maxX) maxX = p.x;
        if (p.y > maxY) maxY = p.y;
    }
    return { min: { x: minX, y: minY }, max: { x: maxX, y: maxY } };
}

/**
 * Walk the mapped strokes in order: travel to the start, engage, draw through the rest,
 * disengage. Strokes with fewer than two vertices have nothing to draw and are skipped.
 */
export function emitToolpath(subpaths: FlatSubpath<'device'>[], warnings: BoundsWarning[] = []): ToolpathDocument {
    const commands: MotionCommand[] = [];
    let vertexCount = 0;

    for (const { vertices } of subpaths) {
        if (vertices.length < 2) continue;
        const [first, ...rest] = vertices;
        commands.push({ kind: 'travel', target: first }, { kind: 'engage', target: first });
        for (const v of rest) commands.push({ kind: 'draw', target: v });
        commands.push({ kind: 'disengage', target: vertices[vertices.length - 1] });
        vertexCount += vertices.length;
    }

    return {
        commands,
        commandCount: commands.length,
        vertexCount,
        boundingBox: boundingBoxOf(commands.map(c => c.target)),
        warnings,
    };
}

export function renderCommand(command: MotionCommand, templates: Templates): string {
    const { target } = command;
    return templates[TEMPLATE_FOR[command.kind]].replace(/\{(x|y)\}/g, (_, axis: string) =>
        (axis === 'x' ? target.x : target.y).toFixed(templates.precision),
    );
}

/** Render the toolpath as newline-joined machine text, bracketed by preamble and postamble. */
export function renderToolpath(document: ToolpathDocument, templates: Templates): string {
    const lines = [templates.preamble, ...document.commands.map(c => renderCommand(c, templates)), templates.postamble];
    // An empty template (e.g. a device without a pen command) contributes no line
    return lines.filter(line => line !== '').join('\n');
}
