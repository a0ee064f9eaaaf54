import test from 'node:test';
import assert from 'node:assert/strict';
import { convert } from '../src/compiler';
import { BoundsError, GeometryError, ParseError, UnsupportedElementError } from '../src/errors';
import { resolveSettings } from '../src/settings';

const SQUARE = '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100"><rect x="10" y="10" width="80" height="80"/></svg>';
const settings = resolveSettings({ bedMaxX: 150, bedMaxY: 150, scale: 1, flatnessTolerance: 0.2 });

test('convert: square compiles to one pen-down loop', () => {
    const { gcode, metadata } = convert(SQUARE, settings);
    assert.equal(gcode, [
        'G28',
        'G1 Z5.0',
        'G4 P200',
        'G0 X10.0 Y90.0',
        'M03',
        'G1 X90.0 Y90.0',
        'G1 X90.0 Y10.0',
        'G1 X10.0 Y10.0',
        'G1 X10.0 Y90.0',
        'M05',
        'G28',
    ].join('\n'));
    assert.deepEqual(metadata, {
        commandCount: 7,
        vertexCount: 5,
        boundingBox: { min: { x: 10, y: 10 }, max: { x: 90, y: 90 } },
        scale: 1,
        warnings: [],
    });
});

test('convert: accepts a shape document directly', () => {
    const { document } = convert({ width: 100, height: 100, shapes: [{ kind: 'line', x1: 0, y1: 0, x2: 50, y2: 0 }] }, settings);
    assert.deepEqual(document.commands.map(c => [c.kind, c.target.x, c.target.y]), [
        ['travel', 0, 100],
        ['engage', 0, 100],
        ['draw', 50, 100],
        ['disengage', 50, 100],
    ]);
});

test('convert: circle stays on the bed with alternating pen state', () => {
    const markup = '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100"><circle cx="50" cy="50" r="40"/></svg>';
    const { document, metadata } = convert(markup, settings);
    const kinds = document.commands.map(c => c.kind);
    assert.equal(kinds[0], 'travel');
    assert.equal(kinds[1], 'engage');
    assert.equal(kinds[kinds.length - 1], 'disengage');
    assert.ok(kinds.slice(2, -1).every(k => k === 'draw'));
    assert.equal(metadata.vertexCount, kinds.length - 2);
    for (const { target } of document.commands) {
        assert.ok(Math.abs(Math.hypot(target.x - 50, target.y - 50) - 40) <= 0.04);
    }
});

test('convert: auto scale shrinks an oversized canvas', () => {
    const markup = '<svg xmlns="http://www.w3.org/2000/svg" width="300" height="300"><line x1="0" y1="0" x2="300" y2="300"/></svg>';
    const { metadata } = convert(markup, resolveSettings({ bedMaxX: 150, bedMaxY: 150 }));
    assert.equal(metadata.scale, 0.5);
    assert.deepEqual(metadata.boundingBox, { min: { x: 0, y: 0 }, max: { x: 150, y: 150 } });
});

test('convert: out-of-bed geometry is clamped with a warning, or rejected', () => {
    const markup = '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100"><line x1="10" y1="10" x2="200" y2="10"/></svg>';
    const { metadata } = convert(markup, settings);
    assert.deepEqual(metadata.warnings, [{ shapeIndex: 0, subpathIndex: 0, clampedVertices: 1 }]);
    assert.deepEqual(metadata.boundingBox, { min: { x: 10, y: 90 }, max: { x: 150, y: 90 } });

    assert.throws(() => convert(markup, resolveSettings({ ...settings, boundsPolicy: 'reject' })), BoundsError);
});

test('convert: errors abort the whole conversion', () => {
    const wrap = (body: string) => `<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100">${body}</svg>`;
    assert.throws(() => convert(wrap('<line x2="5"/><text>label</text>'), settings), UnsupportedElementError);
    assert.throws(() => convert(wrap('<circle r="x"/>'), settings), ParseError);
    assert.throws(() => convert(wrap('<path d="M0 0 L1e400 0"/>'), settings), (error: unknown) => {
        assert.ok(error instanceof GeometryError);
        assert.deepEqual(error.context, { shapeIndex: 0, kind: 'path' });
        return true;
    });
});

test('convert: empty drawing renders only preamble and postamble', () => {
    const { gcode, metadata } = convert('<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10"></svg>', settings);
    assert.equal(gcode, 'G28\nG1 Z5.0\nG4 P200\nG28');
    assert.equal(metadata.commandCount, 0);
    assert.equal(metadata.boundingBox, null);
});

test('convert: a shape document needs a positive finite canvas', () => {
    const line = { kind: 'line' as const, x1: 0, y1: 0, x2: 5, y2: 5 };
    assert.throws(() => convert({ width: 100, height: 0, shapes: [line] }, settings), {
        name: 'ParseError',
        message: 'canvas size must be positive, got 100x0',
    });
    assert.throws(() => convert({ width: -10, height: 100, shapes: [line] }, settings), ParseError);
    assert.throws(() => convert({ width: 100, height: Number.NaN, shapes: [line] }, settings), ParseError);
    assert.throws(() => convert({ width: Infinity, height: 100, shapes: [line] }, settings), ParseError);
});
