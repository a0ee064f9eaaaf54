import { arcToBeziers, straightSegment } from './arc';
import { applyMatrix } from './transform';
import { BezierSegment, Point, ShapeDocument, ShapeKind, ShapeOfKind, ShapePrimitive, Subpath } from './types';

// Control-point offset for a quarter ellipse: 4/3 * (sqrt(2) - 1)
export const KAPPA = 0.5522847498307936;

// A stroke before it is attributed to its shape
type Stroke = Omit<Subpath, 'shapeIndex' | 'kind'>;

const samePoint = (a: Point, b: Point) => a.x === b.x && a.y === b.y;

function polylineStrokes(points: readonly Point[], closed: boolean): Stroke[] {
    if (points.length === 0) return [];
    const segments: BezierSegment[] = [];
    for (let i = 0; i < points.length - 1; i++) segments.push(straightSegment(points[i], points[i + 1]));
    const first = points[0];
    const last = points[points.length - 1];
    if (closed && points.length > 1 && !samePoint(first, last)) segments.push(straightSegment(last, first));
    return [{ segments, closed }];
}

function ellipseStrokes(cx: number, cy: number, rx: number, ry: number): Stroke[] {
    if (rx === 0 || ry === 0) return [];
    const kx = rx * KAPPA;
    const ky = ry * KAPPA;
    const right = { x: cx + rx, y: cy };
    const bottom = { x: cx, y: cy + ry };
    const left = { x: cx - rx, y: cy };
    const top = { x: cx, y: cy - ry };
    return [{
        closed: true,
        segments: [
            { p0: right, p1: { x: cx + rx, y: cy + ky }, p2: { x: cx + kx, y: cy + ry }, p3: bottom },
            { p0: bottom, p1: { x: cx - kx, y: cy + ry }, p2: { x: cx - rx, y: cy + ky }, p3: left },
            { p0: left, p1: { x: cx - rx, y: cy - ky }, p2: { x: cx - kx, y: cy - ry }, p3: top },
            { p0: top, p1: { x: cx + kx, y: cy - ry }, p2: { x: cx + rx, y: cy - ky }, p3: right },
        ],
    }];
}

// Degree elevation: the cubic through the same curve as quadratic (p0, q, p3)
function quadraticToCubic(p0: Point, q: Point, p3: Point): BezierSegment {
    return {
        p0,
        p1: { x: p0.x + (2 / 3) * (q.x - p0.x), y: p0.y + (2 / 3) * (q.y - p0.y) },
        p2: { x: p3.x + (2 / 3) * (q.x - p3.x), y: p3.y + (2 / 3) * (q.y - p3.y) },
        p3,
    };
}

function pathStrokes(shape: ShapeOfKind<'path'>): Stroke[] {
    const strokes: Stroke[] = [];
    let current: Stroke | null = null;
    let cursor: Point = { x: 0, y: 0 };
    let start: Point = cursor;
    // Reflection sources for S/T; null when the previous command was not of the same family
    let lastCubicControl: Point | null = null;
    let lastQuadControl: Point | null = null;

    const open = (): Stroke => {
        if (!current) {
            current = { segments: [], closed: false };
            strokes.push(current);
        }
        return current;
    };
    const reflect = (control: Point | null): Point => (control ? { x: 2 * cursor.x - control.x, y: 2 * cursor.y - control.y } : cursor);

    for (const cmd of shape.commands) {
        if (cmd.code === 'Z') {
            const stroke = open();
            if (!samePoint(cursor, start)) stroke.segments.push(straightSegment(cursor, start));
            stroke.closed = true;
            cursor = start;
            current = null;
            lastCubicControl = lastQuadControl = null;
            continue;
        }

        const base = cmd.relative ? cursor : { x: 0, y: 0 };
        const abs = (x: number, y: number): Point => ({ x: base.x + x, y: base.y + y });
        let nextCubic: Point | null = null;
        let nextQuad: Point | null = null;

        switch (cmd.code) {
            case 'M': {
                cursor = abs(cmd.x, cmd.y);
                start = cursor;
                current = null;
                open();
                break;
            }
            case 'L': {
                const to = abs(cmd.x, cmd.y);
                open().segments.push(straightSegment(cursor, to));
                cursor = to;
                break;
            }
            case 'H': {
                const to = { x: base.x + cmd.x, y: cursor.y };
                open().segments.push(straightSegment(cursor, to));
                cursor = to;
                break;
            }
            case 'V': {
                const to = { x: cursor.x, y: base.y + cmd.y };
                open().segments.push(straightSegment(cursor, to));
                cursor = to;
                break;
            }
            case 'C': {
                const segment = { p0: cursor, p1: abs(cmd.x1, cmd.y1), p2: abs(cmd.x2, cmd.y2), p3: abs(cmd.x, cmd.y) };
                open().segments.push(segment);
                nextCubic = segment.p2;
                cursor = segment.p3;
                break;
            }
            case 'S': {
                const segment: BezierSegment = { p0: cursor, p1: reflect(lastCubicControl), p2: abs(cmd.x2, cmd.y2), p3: abs(cmd.x, cmd.y) };
                open().segments.push(segment);
                nextCubic = segment.p2;
                cursor = segment.p3;
                break;
            }
            case 'Q': {
                const control = abs(cmd.x1, cmd.y1);
                const to = abs(cmd.x, cmd.y);
                open().segments.push(quadraticToCubic(cursor, control, to));
                nextQuad = control;
                cursor = to;
                break;
            }
            case 'T': {
                const control = reflect(lastQuadControl);
                const to = abs(cmd.x, cmd.y);
                open().segments.push(quadraticToCubic(cursor, control, to));
                nextQuad = control;
                cursor = to;
                break;
            }
            case 'A': {
                const to = abs(cmd.x, cmd.y);
                open().segments.push(...arcToBeziers(cursor, { rx: cmd.rx, ry: cmd.ry, rotation: cmd.rotation, largeArc: cmd.largeArc, sweep: cmd.sweep, to }));
                cursor = to;
                break;
            }
        }

        lastCubicControl = nextCubic;
        lastQuadControl = nextQuad;
    }

    return strokes;
}

// Adding a shape kind without an entry here is a compile error
const EXPANSIONS: { [K in ShapeKind]: (shape: ShapeOfKind<K>) => Stroke[] } = {
    line: s => [{ segments: [straightSegment({ x: s.x1, y: s.y1 }, { x: s.x2, y: s.y2 })], closed: false }],
    rect: s => {
        if (s.width === 0 || s.height === 0) return [];
        const tl = { x: s.x, y: s.y };
        const tr = { x: s.x + s.width, y: s.y };
        const br = { x: s.x + s.width, y: s.y + s.height };
        const bl = { x: s.x, y: s.y + s.height };
        // Clockwise on screen (y down), starting top-left
        return [{ closed: true, segments: [straightSegment(tl, tr), straightSegment(tr, br), straightSegment(br, bl), straightSegment(bl, tl)] }];
    },
    circle: s => ellipseStrokes(s.cx, s.cy, s.r, s.r),
    ellipse: s => ellipseStrokes(s.cx, s.cy, s.rx, s.ry),
    polyline: s => polylineStrokes(s.points, false),
    polygon: s => polylineStrokes(s.points, true),
    path: pathStrokes,
};

function expand<K extends ShapeKind>(kind: K, shape: ShapeOfKind<K>): Stroke[] {
    return EXPANSIONS[kind](shape);
}

/** Expand one shape into Bezier subpaths in source space, applying its transform. */
export function normalizeShape(shape: ShapePrimitive, shapeIndex: number): Subpath[] {
    const { kind, transform } = shape;
    const map = (p: Point) => (transform ? applyMatrix(transform, p) : p);

    return expand(kind, shape).map(stroke => ({
        shapeIndex,
        kind,
        closed: stroke.closed,
        segments: transform
            ? stroke.segments.map(s => ({ p0: map(s.p0), p1: map(s.p1), p2: map(s.p2), p3: map(s.p3) }))
            : stroke.segments,
    }));
}

export function normalizeDocument(document: ShapeDocument): Subpath[] {
    return document.shapes.flatMap((shape, index) => normalizeShape(shape, index));
}
