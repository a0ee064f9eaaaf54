import { ErrorContext, ParseError } from './errors';
import { Matrix, Point } from './types';

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

export function multiply(m: Matrix, n: Matrix): Matrix {
    return [
        m[0] * n[0] + m[2] * n[1],
        m[1] * n[0] + m[3] * n[1],
        m[0] * n[2] + m[2] * n[3],
        m[1] * n[2] + m[3] * n[3],
        m[0] * n[4] + m[2] * n[5] + m[4],
        m[1] * n[4] + m[3] * n[5] + m[5],
    ];
}

export function applyMatrix(m: Matrix, p: Point): Point {
    return { x: m[0] * p.x + m[2] * p.y + m[4], y: m[1] * p.x + m[3] * p.y + m[5] };
}

export const isIdentity = (m: Matrix): boolean => m.every((v, i) => v === IDENTITY[i]);

const toRadians = (deg: number) => (deg * Math.PI) / 180;

function fromFunction(name: string, args: number[], context: ErrorContext): Matrix {
    const expect = (...counts: number[]) => {
        if (!counts.includes(args.length)) {
            throw new ParseError(`${name}() takes ${counts.join(' or ')} arguments, got ${args.length}`, context);
        }
    };

    switch (name) {
        case 'matrix': {
            expect(6);
            const [a, b, c, d, e, f] = args;
            return [a, b, c, d, e, f];
        }
        case 'translate':
            expect(1, 2);
            return [1, 0, 0, 1, args[0], args[1] ?? 0];
        case 'scale':
            expect(1, 2);
            return [args[0], 0, 0, args[1] ?? args[0], 0, 0];
        case 'rotate': {
            expect(1, 3);
            const a = toRadians(args[0]);
            const rotation: Matrix = [Math.cos(a), Math.sin(a), -Math.sin(a), Math.cos(a), 0, 0];
            if (args.length === 1) return rotation;
            const [, cx, cy] = args;
            return multiply(multiply([1, 0, 0, 1, cx, cy], rotation), [1, 0, 0, 1, -cx, -cy]);
        }
        case 'skewX':
            expect(1);
            return [1, 0, Math.tan(toRadians(args[0])), 1, 0, 0];
        case 'skewY':
            expect(1);
            return [1, Math.tan(toRadians(args[0])), 0, 1, 0, 0];
        default:
            throw new ParseError(`unknown transform function "${name}"`, context);
    }
}

/**
 * Parse an SVG transform list ("translate(10 20) rotate(45)") into one matrix. Functions
 * compose left to right, so the rightmost applies to the geometry first.
 */
export function parseTransform(value: string, context: ErrorContext = {}): Matrix {
    const fnRegex = /\s*([a-zA-Z]+)\s*\(([^)]*)\)\s*,?/y;
    let result: Matrix = IDENTITY;
    let pos = 0;

    while (pos < value.length) {
        fnRegex.lastIndex = pos;
        const match = fnRegex.exec(value);
        if (!match) {
            if (value.slice(pos).trim() === '') break;
            throw new ParseError(`malformed transform "${value}"`, context);
        }
        pos = fnRegex.lastIndex;

        const [, name, argStr] = match;
        const parts = argStr.trim().split(/[\s,]+/).filter(p => p);
        const args = parts.map(Number);
        if (args.some(Number.isNaN)) {
            throw new ParseError(`non-numeric argument in ${name}(${argStr})`, context);
        }
        result = multiply(result, fromFunction(name, args, context));
    }

    return result;
}
