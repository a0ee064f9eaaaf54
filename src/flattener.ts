import { ErrorContext, GeometryError } from './errors';
import { BezierSegment, FlatSubpath, Point, Subpath, Vertex, sourceVertex } from './types';

export const MAX_SUBDIVISION_DEPTH = 16;

// Chord lengths and cross products at or below this count as zero
const DEGENERATE_EPSILON = 1e-9;

const lerp = (a: Point, b: Point, t: number): Point => ({ x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t });

/** De Casteljau split at parameter t; the two halves trace the original curve exactly. */
export function splitSegment(segment: BezierSegment, t: number): [BezierSegment, BezierSegment] {
    const { p0, p1, p2, p3 } = segment;
    const a = lerp(p0, p1, t);
    const b = lerp(p1, p2, t);
    const c = lerp(p2, p3, t);
    const d = lerp(a, b, t);
    const e = lerp(b, c, t);
    const mid = lerp(d, e, t);
    return [
        { p0, p1: a, p2: d, p3: mid },
        { p0: mid, p1: e, p2: c, p3 },
    ];
}

// Perpendicular distance from p to the line through a and b, or to a when a and b coincide
function distanceToChord(p: Point, a: Point, b: Point): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const length = Math.hypot(dx, dy);
    if (length <= DEGENERATE_EPSILON) return Math.hypot(p.x - a.x, p.y - a.y);
    return Math.abs(dx * (p.y - a.y) - dy * (p.x - a.x)) / length;
}

export function isFlat(segment: BezierSegment, tolerance: number): boolean {
    const { p0, p1, p2, p3 } = segment;
    return distanceToChord(p1, p0, p3) <= tolerance && distanceToChord(p2, p0, p3) <= tolerance;
}

// Start and end coincide and both control points lie on one line through them
function isCollapsed(segment: BezierSegment): boolean {
    const { p0, p1, p2, p3 } = segment;
    if (Math.hypot(p3.x - p0.x, p3.y - p0.y) > DEGENERATE_EPSILON) return false;
    const cross = (p1.x - p0.x) * (p2.y - p0.y) - (p1.y - p0.y) * (p2.x - p0.x);
    return Math.abs(cross) <= DEGENERATE_EPSILON;
}

function assertFinite(segment: BezierSegment, context: ErrorContext = {}): void {
    for (const key of ['p0', 'p1', 'p2', 'p3'] as const) {
        const { x, y } = segment[key];
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            throw new GeometryError(`control point ${key} is not finite (${x}, ${y})`, context);
        }
    }
}

function subdivide(segment: BezierSegment, tolerance: number, depth: number, maxDepth: number, out: Vertex<'source'>[]): void {
    if (depth >= maxDepth || isFlat(segment, tolerance)) {
        out.push(sourceVertex(segment.p3));
        return;
    }
    const [left, right] = splitSegment(segment, 0.5);
    subdivide(left, tolerance, depth + 1, maxDepth, out);
    subdivide(right, tolerance, depth + 1, maxDepth, out);
}

/**
 * Approximate one cubic with a polyline whose interior control points sit within
 * `tolerance` of each chord. Recursion stops at `maxDepth`, so the result has at most
 * 2^maxDepth + 1 vertices.
 */
export function flattenSegment(segment: BezierSegment, tolerance: number, maxDepth: number = MAX_SUBDIVISION_DEPTH): Vertex<'source'>[] {
    assertFinite(segment);
    if (isCollapsed(segment)) return [sourceVertex(segment.p0), sourceVertex(segment.p3)];
    const out = [sourceVertex(segment.p0)];
    subdivide(segment, tolerance, 0, maxDepth, out);
    return out;
}

export function flattenSubpath(subpath: Subpath, tolerance: number, maxDepth: number = MAX_SUBDIVISION_DEPTH): FlatSubpath<'source'> {
    const vertices: Vertex<'source'>[] = [];
    for (const segment of subpath.segments) {
        assertFinite(segment, { shapeIndex: subpath.shapeIndex, kind: subpath.kind });
        const points = flattenSegment(segment, tolerance, maxDepth);
        // Each segment starts where the previous one ended
        vertices.push(...(vertices.length === 0 ? points : points.slice(1)));
    }
    return { shapeIndex: subpath.shapeIndex, kind: subpath.kind, vertices, closed: subpath.closed };
}
