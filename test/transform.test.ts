import test from 'node:test';
import assert from 'node:assert/strict';
import { ParseError } from '../src/errors';
import { IDENTITY, applyMatrix, isIdentity, parseTransform } from '../src/transform';
import { Point } from '../src/types';

function assertNear(actual: Point, expected: Point, eps = 1e-9) {
    assert.ok(Math.abs(actual.x - expected.x) < eps, `x: ${actual.x} != ${expected.x}`);
    assert.ok(Math.abs(actual.y - expected.y) < eps, `y: ${actual.y} != ${expected.y}`);
}

test('parseTransform: translate', () => {
    assert.deepEqual(parseTransform('translate(10 20)'), [1, 0, 0, 1, 10, 20]);
    assert.deepEqual(parseTransform('translate(5)'), [1, 0, 0, 1, 5, 0]);
});

test('parseTransform: matrix is taken as written', () => {
    assert.deepEqual(parseTransform('matrix(1,2,3,4,5,6)'), [1, 2, 3, 4, 5, 6]);
});

test('parseTransform: list composes left to right', () => {
    const m = parseTransform('translate(10) scale(2)');
    assert.deepEqual(m, [2, 0, 0, 2, 10, 0]);
    assert.deepEqual(applyMatrix(m, { x: 1, y: 1 }), { x: 12, y: 2 });
});

test('parseTransform: rotate about the origin and about a centre', () => {
    assertNear(applyMatrix(parseTransform('rotate(90)'), { x: 1, y: 0 }), { x: 0, y: 1 });
    assertNear(applyMatrix(parseTransform('rotate(90 10 10)'), { x: 20, y: 10 }), { x: 10, y: 20 });
});

test('parseTransform: skewX shifts x by y', () => {
    assertNear(applyMatrix(parseTransform('skewX(45)'), { x: 0, y: 10 }), { x: 10, y: 10 });
});

test('parseTransform: blank value is the identity', () => {
    assert.ok(isIdentity(parseTransform('')));
    assert.ok(isIdentity(parseTransform('  ')));
    assert.ok(isIdentity(IDENTITY));
});

test('parseTransform: malformed input is a parse error', () => {
    assert.throws(() => parseTransform('translate(10'), ParseError);
    assert.throws(() => parseTransform('shear(1)'), { name: 'ParseError', message: 'unknown transform function "shear"' });
    assert.throws(() => parseTransform('matrix(1 2 3)'), { name: 'ParseError', message: 'matrix() takes 6 arguments, got 3' });
    assert.throws(() => parseTransform('scale(a)'), ParseError);
});
