import test from 'node:test';
import assert from 'node:assert/strict';
import { arcToBeziers, straightSegment } from '../src/arc';
import { flattenSegment } from '../src/flattener';
import { KAPPA } from '../src/normalizer';
import { Point } from '../src/types';

function assertNear(actual: Point, expected: Point, eps = 1e-9) {
    assert.ok(Math.abs(actual.x - expected.x) < eps, `x: ${actual.x} != ${expected.x}`);
    assert.ok(Math.abs(actual.y - expected.y) < eps, `y: ${actual.y} != ${expected.y}`);
}

test('arcToBeziers: semicircle splits into two quarter pieces', () => {
    const segments = arcToBeziers({ x: 0, y: 0 }, { rx: 50, ry: 50, rotation: 0, largeArc: false, sweep: true, to: { x: 100, y: 0 } });
    assert.equal(segments.length, 2);
    assertNear(segments[0].p1, { x: 0, y: -50 * KAPPA });
    assertNear(segments[0].p3, { x: 50, y: -50 });
    assert.equal(segments[1].p0, segments[0].p3);
    assert.deepEqual(segments[1].p3, { x: 100, y: 0 });
});

test('arcToBeziers: large arc against the sweep takes three pieces', () => {
    const from = { x: 50, y: 0 };
    const to = { x: 0, y: 50 };
    const segments = arcToBeziers(from, { rx: 50, ry: 50, rotation: 0, largeArc: true, sweep: false, to });
    assert.equal(segments.length, 3);
    assertNear(segments[0].p3, { x: 0, y: -50 });
    assertNear(segments[1].p3, { x: -50, y: 0 });
    assert.deepEqual(segments[2].p3, to);

    for (const segment of segments) {
        for (const v of flattenSegment(segment, 0.05)) {
            assert.ok(Math.abs(Math.hypot(v.x, v.y) - 50) < 0.05, `(${v.x}, ${v.y}) is off the circle`);
        }
    }
});

test('arcToBeziers: radii too small to span the endpoints are scaled up', () => {
    const segments = arcToBeziers({ x: 0, y: 0 }, { rx: 10, ry: 10, rotation: 0, largeArc: false, sweep: true, to: { x: 100, y: 0 } });
    assert.equal(segments.length, 2);
    assertNear(segments[0].p3, { x: 50, y: -50 });
});

test('arcToBeziers: zero radius draws a straight line', () => {
    const from = { x: 0, y: 0 };
    const to = { x: 9, y: 3 };
    assert.deepEqual(
        arcToBeziers(from, { rx: 0, ry: 5, rotation: 0, largeArc: false, sweep: false, to }),
        [straightSegment(from, to)],
    );
});

test('arcToBeziers: identical endpoints draw nothing', () => {
    assert.deepEqual(arcToBeziers({ x: 3, y: 3 }, { rx: 5, ry: 5, rotation: 0, largeArc: true, sweep: true, to: { x: 3, y: 3 } }), []);
});

test('arcToBeziers: rotated ellipse ends exactly at the target', () => {
    const to = { x: 40, y: 10 };
    const segments = arcToBeziers({ x: 0, y: 0 }, { rx: 30, ry: 10, rotation: 30, largeArc: false, sweep: true, to });
    assert.ok(segments.length >= 1 && segments.length <= 4);
    for (let i = 1; i < segments.length; i++) assert.equal(segments[i].p0, segments[i - 1].p3);
    assert.deepEqual(segments[segments.length - 1].p3, to);
});
