import test from 'node:test';
import assert from 'node:assert/strict';
import { BoundsError, GeometryError } from '../src/errors';
import { MappingParams, mapToDevice, resolveScale } from '../src/mapper';
import { FlatSubpath, sourceVertex } from '../src/types';

const params: MappingParams = { scale: 1, sourceHeight: 100, bedMaxX: 150, bedMaxY: 150, boundsPolicy: 'clamp' };

function subpath(points: [number, number][], shapeIndex = 0): FlatSubpath<'source'> {
    return { shapeIndex, kind: 'polyline', closed: false, vertices: points.map(([x, y]) => sourceVertex({ x, y })) };
}

test('mapToDevice: flips y against the canvas height', () => {
    const { subpaths, warnings } = mapToDevice([subpath([[10, 10], [90, 10], [90, 90]])], params);
    assert.deepEqual(subpaths[0].vertices, [
        { space: 'device', x: 10, y: 90 },
        { space: 'device', x: 90, y: 90 },
        { space: 'device', x: 90, y: 10 },
    ]);
    assert.deepEqual(warnings, []);
});

test('mapToDevice: applies the scale after flipping', () => {
    const { subpaths } = mapToDevice([subpath([[10, 10]])], { ...params, scale: 0.5 });
    assert.deepEqual(subpaths[0].vertices, [{ space: 'device', x: 5, y: 45 }]);
});

test('mapToDevice: keeps shape attribution and closure', () => {
    const input: FlatSubpath<'source'> = { shapeIndex: 7, kind: 'rect', closed: true, vertices: [sourceVertex({ x: 0, y: 0 })] };
    const [mapped] = mapToDevice([input], params).subpaths;
    assert.equal(mapped.shapeIndex, 7);
    assert.equal(mapped.kind, 'rect');
    assert.equal(mapped.closed, true);
});

test('mapToDevice: clamps out-of-bed vertices and reports them', () => {
    const { subpaths, warnings } = mapToDevice(
        [subpath([[10, 10]]), subpath([[-5, 50], [200, -60], [20, 20]], 1)],
        params,
    );
    assert.deepEqual(subpaths[1].vertices, [
        { space: 'device', x: 0, y: 50 },
        { space: 'device', x: 150, y: 150 },
        { space: 'device', x: 20, y: 80 },
    ]);
    assert.deepEqual(warnings, [{ shapeIndex: 1, subpathIndex: 1, clampedVertices: 2 }]);
});

test('mapToDevice: vertices on the bed edge are inside', () => {
    const { warnings } = mapToDevice([subpath([[0, 100], [150, -50]])], params);
    assert.deepEqual(warnings, []);
});

test('mapToDevice: reject policy raises a bounds error', () => {
    assert.throws(() => mapToDevice([subpath([[10, 10]]), subpath([[160, 10]], 4)], { ...params, boundsPolicy: 'reject' }), (error: unknown) => {
        assert.ok(error instanceof BoundsError);
        assert.deepEqual(error.context, { shapeIndex: 4, kind: 'polyline' });
        assert.equal(error.message, 'shape #4 <polyline>: vertex (160, 90) lies outside the 150x150 bed');
        return true;
    });
});

test('mapToDevice: overflowing coordinates are a geometry error', () => {
    assert.throws(() => mapToDevice([subpath([[1e308, 0]])], { ...params, scale: 10 }), GeometryError);
});

test('resolveScale: auto fits the canvas without enlarging it', () => {
    const bed = { bedMaxX: 200, bedMaxY: 200 };
    assert.equal(resolveScale('auto', { width: 400, height: 100 }, bed), 0.5);
    assert.equal(resolveScale('auto', { width: 100, height: 800 }, bed), 0.25);
    assert.equal(resolveScale('auto', { width: 100, height: 100 }, bed), 1);
    assert.equal(resolveScale(3, { width: 100, height: 100 }, bed), 3);
});
