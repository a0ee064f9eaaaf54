import { BoundsError, GeometryError } from './errors';
import { BoundsWarning, FlatSubpath, Vertex, deviceVertex } from './types';

export type BoundsPolicy = 'clamp' | 'reject';

export type MappingParams = {
    scale: number;
    sourceHeight: number;
    bedMaxX: number;
    bedMaxY: number;
    boundsPolicy: BoundsPolicy;
};

export type MappedToolpath = { subpaths: FlatSubpath<'device'>[]; warnings: BoundsWarning[] };

const clamp = (v: number, max: number) => Math.min(Math.max(v, 0), max);

/**
 * Pick the source-to-device scale. 'auto' fits the canvas onto the bed but never enlarges it.
 */
export function resolveScale(
    scale: number | 'auto',
    canvas: { width: number; height: number },
    bed: { bedMaxX: number; bedMaxY: number },
): number {
    if (scale !== 'auto') return scale;
    return Math.min(bed.bedMaxX / canvas.width, bed.bedMaxY / canvas.height, 1);
}

/**
 * Scale and flip source vertices into device space (origin bottom-left, y up). Vertices
 * that leave the bed are clamped onto its edge and reported, or rejected, per `boundsPolicy`.
 */
export function mapToDevice(subpaths: FlatSubpath<'source'>[], params: MappingParams): MappedToolpath {
    const { scale, sourceHeight, bedMaxX, bedMaxY, boundsPolicy } = params;
    const warnings: BoundsWarning[] = [];

    const mapped = subpaths.map((subpath, subpathIndex): FlatSubpath<'device'> => {
        const context = { shapeIndex: subpath.shapeIndex, kind: subpath.kind };
        let clampedVertices = 0;

        const vertices = subpath.vertices.map((v): Vertex<'device'> => {
            const x = v.x * scale;
            const y = (sourceHeight - v.y) * scale;
            if (!Number.isFinite(x) || !Number.isFinite(y)) {
                throw new GeometryError(`vertex (${v.x}, ${v.y}) maps to a non-finite device position`, context);
            }
            if (x >= 0 && x <= bedMaxX && y >= 0 && y <= bedMaxY) return deviceVertex(x, y);

            if (boundsPolicy === 'reject') {
                throw new BoundsError(`vertex (${x}, ${y}) lies outside the ${bedMaxX}x${bedMaxY} bed`, context);
            }
            clampedVertices++;
            return deviceVertex(clamp(x, bedMaxX), clamp(y, bedMaxY));
        });

        if (clampedVertices > 0) warnings.push({ shapeIndex: subpath.shapeIndex, subpathIndex, clampedVertices });
        return { shapeIndex: subpath.shapeIndex, kind: subpath.kind, vertices, closed: subpath.closed };
    });

    return { subpaths: mapped, warnings };
}
