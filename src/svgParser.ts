import { parse } from 'svg-parser';
import type { ElementNode, Node } from 'svg-parser';
import { ErrorContext, ParseError, UnsupportedElementError } from './errors';
import { parsePathData } from './pathData';
import { IDENTITY, isIdentity, multiply, parseTransform } from './transform';
import { Matrix, Point, ShapeDocument, ShapeKind, ShapePrimitive } from './types';

type Properties = Record<string, string | number>;

const SHAPE_TAGS: ReadonlySet<string> = new Set<ShapeKind>(['rect', 'circle', 'ellipse', 'line', 'polyline', 'polygon', 'path']);
const CONTAINER_TAGS = new Set(['svg', 'g', 'a', 'switch']);
// Subtrees that never draw directly
const SKIPPED_TAGS = new Set(['defs', 'title', 'desc', 'metadata', 'style', 'symbol', 'clipPath', 'mask', 'marker', 'pattern', 'script']);
const UNSUPPORTED_TAGS = new Set(['text', 'tspan', 'textPath', 'image', 'use', 'foreignObject']);

const NUMERIC = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

const localName = (tagName: string) => tagName.slice(tagName.indexOf(':') + 1);

function parseNumber(raw: string | number, attr: string, context: ErrorContext): number {
    const text = String(raw).trim();
    const value = NUMERIC.test(text) ? parseFloat(text) : Number.NaN;
    if (!Number.isFinite(value)) {
        throw new ParseError(`attribute "${attr}" is not a number: "${raw}"`, context);
    }
    return value;
}

function numberAttr(props: Properties, attr: string, context: ErrorContext): number {
    const raw = props[attr];
    return raw === undefined || raw === '' ? 0 : parseNumber(raw, attr, context);
}

function nonNegativeAttr(props: Properties, attr: string, context: ErrorContext): number {
    const value = numberAttr(props, attr, context);
    if (value < 0) throw new ParseError(`attribute "${attr}" must not be negative, got ${value}`, context);
    return value;
}

function parsePoints(pointsStr: string, context: ErrorContext): Point[] {
    const values = pointsStr.split(/[\s,]+/).filter(p => p).map(p => parseNumber(p, 'points', context));
    if (values.length % 2 !== 0) {
        throw new ParseError(`attribute "points" has an odd number of coordinates (${values.length})`, context);
    }
    const points: Point[] = [];
    for (let i = 0; i < values.length; i += 2) points.push({ x: values[i], y: values[i + 1] });
    return points;
}

// "100", "100px" and "72pt" are all read as plain source units
function parseLength(raw: string | number | undefined, attr: string): number | undefined {
    if (raw === undefined) return undefined;
    const match = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*(px|pt)?\s*$/.exec(String(raw));
    const value = match ? parseFloat(match[1]) : Number.NaN;
    if (!Number.isFinite(value)) throw new ParseError(`unsupported <svg> ${attr} "${raw}"`);
    return value;
}

// svg-parser coerces attribute values with unary plus, which also takes "0x10", "0b11" and
// "Infinity"; those never reach parseNumber as text, so check the raw markup for them
const NUMERIC_ATTRS = new Set(['x', 'y', 'width', 'height', 'cx', 'cy', 'r', 'rx', 'ry', 'x1', 'y1', 'x2', 'y2']);

function checkCoercedLiterals(markup: string): void {
    for (const [, tagName, attrs] of markup.matchAll(/<([a-zA-Z][^\s/>]*)([^>]*)>/g)) {
        const tag = localName(tagName);
        if (tag !== 'svg' && !SHAPE_TAGS.has(tag)) continue;
        for (const [, name, doubleQuoted, singleQuoted] of attrs.matchAll(/([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
            const value = (doubleQuoted ?? singleQuoted ?? '').trim();
            if (NUMERIC_ATTRS.has(name) && value !== '' && !Number.isNaN(Number(value)) && !NUMERIC.test(value)) {
                throw new ParseError(`attribute "${name}" is not a number: "${value}"`, { kind: tag });
            }
        }
    }
}

function readCanvasSize(props: Properties): { width: number; height: number } {
    let width = parseLength(props.width, 'width');
    let height = parseLength(props.height, 'height');

    if (width === undefined || height === undefined) {
        const viewBox = props.viewBox;
        if (viewBox !== undefined) {
            const parts = String(viewBox).trim().split(/[\s,]+/).map(Number);
            if (parts.length !== 4 || !parts.every(Number.isFinite)) {
                throw new ParseError(`malformed viewBox "${viewBox}"`);
            }
            width = parts[2];
            height = parts[3];
        }
    }

    if (width === undefined || height === undefined) {
        throw new ParseError('unable to get width or height for the svg');
    }
    if (!(width > 0) || !(height > 0)) {
        throw new ParseError(`canvas size must be positive, got ${width}x${height}`);
    }
    return { width, height };
}

function readShape(kind: ShapeKind, props: Properties, context: ErrorContext): ShapePrimitive {
    switch (kind) {
        case 'rect': {
            const rx = numberAttr(props, 'rx', context);
            const ry = numberAttr(props, 'ry', context);
            if (rx !== 0 || ry !== 0) {
                throw new UnsupportedElementError('rounded rectangle corners (rx/ry) are not supported', context);
            }
            return {
                kind,
                x: numberAttr(props, 'x', context),
                y: numberAttr(props, 'y', context),
                width: nonNegativeAttr(props, 'width', context),
                height: nonNegativeAttr(props, 'height', context),
            };
        }
        case 'circle':
            return { kind, cx: numberAttr(props, 'cx', context), cy: numberAttr(props, 'cy', context), r: nonNegativeAttr(props, 'r', context) };
        case 'ellipse':
            return {
                kind,
                cx: numberAttr(props, 'cx', context),
                cy: numberAttr(props, 'cy', context),
                rx: nonNegativeAttr(props, 'rx', context),
                ry: nonNegativeAttr(props, 'ry', context),
            };
        case 'line': {
            const [x1, y1, x2, y2] = ['x1', 'y1', 'x2', 'y2'].map(p => numberAttr(props, p, context));
            return { kind, x1, y1, x2, y2 };
        }
        case 'polyline':
            return { kind, points: parsePoints(String(props.points ?? ''), context) };
        case 'polygon':
            return { kind, points: parsePoints(String(props.points ?? ''), context) };
        case 'path':
            return { kind, commands: parsePathData(String(props.d ?? ''), context) };
    }
}

const isElement = (node: Node | string): node is ElementNode => typeof node === 'object' && node.type === 'element';

function isShapeKind(tag: string): tag is ShapeKind {
    return SHAPE_TAGS.has(tag);
}

/**
 * Parse SVG markup into the ordered list of drawable shapes. Any malformed or unsupported
 * element aborts the whole document.
 */
export function parseSvgDocument(markup: string): ShapeDocument {
    checkCoercedLiterals(markup);

    let parsed: ReturnType<typeof parse>;
    try {
        parsed = parse(markup);
    } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        throw new ParseError(`markup is not well-formed: ${message}`);
    }

    const root = parsed.children.find(
        (node): node is ElementNode => isElement(node) && localName(node.tagName ?? '') === 'svg',
    );
    if (!root) throw new ParseError('document has no <svg> root element');

    const { width, height } = readCanvasSize(root.properties ?? {});
    const shapes: ShapePrimitive[] = [];

    function traverse(node: ElementNode, inherited: Matrix, isRoot: boolean) {
        const tag = localName(node.tagName ?? '');
        const props = node.properties ?? {};
        const context: ErrorContext = { shapeIndex: shapes.length, kind: tag };

        if (SKIPPED_TAGS.has(tag)) return;
        if (UNSUPPORTED_TAGS.has(tag)) {
            throw new UnsupportedElementError(`element is not supported`, context);
        }

        const own = props.transform !== undefined && !isRoot ? parseTransform(String(props.transform), context) : IDENTITY;
        const matrix = multiply(inherited, own);

        if (isShapeKind(tag)) {
            const shape = readShape(tag, props, context);
            shapes.push(isIdentity(matrix) ? shape : { ...shape, transform: matrix });
            return;
        }

        if (CONTAINER_TAGS.has(tag)) {
            node.children.filter(isElement).forEach(child => traverse(child, matrix, false));
        }
    }

    traverse(root, IDENTITY, true);
    return { width, height, shapes };
}
