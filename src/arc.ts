import { BezierSegment, Point } from './types';

export type ArcParams = {
    rx: number;
    ry: number;
    rotation: number; // degrees
    largeArc: boolean;
    sweep: boolean;
    to: Point;
};

export function straightSegment(a: Point, b: Point): BezierSegment {
    return {
        p0: a,
        p1: { x: a.x + (b.x - a.x) / 3, y: a.y + (b.y - a.y) / 3 },
        p2: { x: a.x + ((b.x - a.x) * 2) / 3, y: a.y + ((b.y - a.y) * 2) / 3 },
        p3: b,
    };
}

const clampUnit = (v: number) => Math.max(-1, Math.min(1, v));

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
    const dot = ux * vx + uy * vy;
    const len = Math.sqrt(ux * ux + uy * uy) * Math.sqrt(vx * vx + vy * vy);
    const angle = Math.acos(clampUnit(dot / len));
    return ux * vy - uy * vx < 0 ? -angle : angle;
}

/**
 * Convert an SVG elliptical arc into cubic Beziers via centre parameterisation. Each piece
 * spans at most 90 degrees so the usual 4/3·tan(θ/4) control length stays accurate.
 */
export function arcToBeziers(from: Point, arc: ArcParams): BezierSegment[] {
    const { to } = arc;
    if (from.x === to.x && from.y === to.y) return [];

    let rx = Math.abs(arc.rx);
    let ry = Math.abs(arc.ry);
    if (rx === 0 || ry === 0) return [straightSegment(from, to)];

    const phi = (arc.rotation * Math.PI) / 180;
    const cosPhi = Math.cos(phi);
    const sinPhi = Math.sin(phi);

    // Endpoint midpoint in the ellipse's rotated frame
    const dx = (from.x - to.x) / 2;
    const dy = (from.y - to.y) / 2;
    const x1p = cosPhi * dx + sinPhi * dy;
    const y1p = -sinPhi * dx + cosPhi * dy;

    // Scale radii up when no ellipse of the given size reaches both endpoints
    const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
    if (lambda > 1) {
        const s = Math.sqrt(lambda);
        rx *= s;
        ry *= s;
    }

    const rx2 = rx * rx;
    const ry2 = ry * ry;
    let sq = (rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p) / (rx2 * y1p * y1p + ry2 * x1p * x1p);
    if (sq < 0) sq = 0;
    const coef = (arc.largeArc !== arc.sweep ? 1 : -1) * Math.sqrt(sq);
    const cxp = (coef * rx * y1p) / ry;
    const cyp = (-coef * ry * x1p) / rx;

    const cx = cosPhi * cxp - sinPhi * cyp + (from.x + to.x) / 2;
    const cy = sinPhi * cxp + cosPhi * cyp + (from.y + to.y) / 2;

    const ux = (x1p - cxp) / rx;
    const uy = (y1p - cyp) / ry;
    const vx = (-x1p - cxp) / rx;
    const vy = (-y1p - cyp) / ry;

    const theta1 = vectorAngle(1, 0, ux, uy);
    let delta = vectorAngle(ux, uy, vx, vy);
    if (arc.sweep && delta < 0) delta += 2 * Math.PI;
    if (!arc.sweep && delta > 0) delta -= 2 * Math.PI;

    const pieces = Math.max(1, Math.ceil(Math.abs(delta) / (Math.PI / 2) - 1e-9));
    const step = delta / pieces;
    const k = (4 / 3) * Math.tan(step / 4);

    // Point and derivative on the ellipse at angle t, in source space
    const pointAt = (t: number): Point => ({
        x: cx + rx * Math.cos(t) * cosPhi - ry * Math.sin(t) * sinPhi,
        y: cy + rx * Math.cos(t) * sinPhi + ry * Math.sin(t) * cosPhi,
    });
    const tangentAt = (t: number): Point => ({
        x: -rx * Math.sin(t) * cosPhi - ry * Math.cos(t) * sinPhi,
        y: -rx * Math.sin(t) * sinPhi + ry * Math.cos(t) * cosPhi,
    });

    const segments: BezierSegment[] = [];
    let start = from;
    for (let i = 0; i < pieces; i++) {
        const t0 = theta1 + i * step;
        const t1 = t0 + step;
        const end = i === pieces - 1 ? to : pointAt(t1);
        const d0 = tangentAt(t0);
        const d1 = tangentAt(t1);
        segments.push({
            p0: start,
            p1: { x: start.x + k * d0.x, y: start.y + k * d0.y },
            p2: { x: end.x - k * d1.x, y: end.y - k * d1.y },
            p3: end,
        });
        start = end;
    }
    return segments;
}
