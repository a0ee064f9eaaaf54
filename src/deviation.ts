import { ToolpathDocument } from './types';

export type Coordinate = [number, number];
export type Deviation = { mean: number; errors: number[] };

/** The polyline the machine is expected to follow: travel and draw targets, in order. */
export function toolpathCoordinates(document: ToolpathDocument): Coordinate[] {
    return document.commands
        .filter(c => c.kind === 'travel' || c.kind === 'draw')
        .map((c): Coordinate => [c.target.x, c.target.y]);
}

/**
 * Per-point Euclidean distance between an expected and an executed toolpath, plus its mean.
 */
export function toolpathDeviation(expected: Coordinate[], actual: Coordinate[]): Deviation {
    if (expected.length === 0) throw new RangeError('toolpaths must not be empty');
    if (expected.length !== actual.length) {
        throw new RangeError(`toolpath lengths must match (expected ${expected.length}, actual ${actual.length})`);
    }
    const errors = expected.map(([ex, ey], i) => {
        const [ax, ay] = actual[i];
        return Math.hypot(ex - ax, ey - ay);
    });
    const mean = errors.reduce((sum, e) => sum + e, 0) / errors.length;
    return { mean, errors };
}
