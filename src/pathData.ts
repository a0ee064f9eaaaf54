import { ErrorContext, ParseError, UnsupportedElementError } from './errors';
import { PathCommand } from './types';

const NUMBER = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y;
const SEPARATOR = /[\s,]*/y;
type CommandCode = PathCommand['code'];

// Number of arguments consumed by one repetition of each command
const ARITY: Record<CommandCode, number> = { M: 2, L: 2, T: 2, H: 1, V: 1, C: 6, S: 4, Q: 4, A: 7, Z: 0 };

const isCommandCode = (code: string): code is CommandCode => Object.prototype.hasOwnProperty.call(ARITY, code);

class PathDataScanner {
    private pos = 0;

    constructor(private readonly d: string, private readonly context: ErrorContext) {}

    skipSeparators(): void {
        SEPARATOR.lastIndex = this.pos;
        if (SEPARATOR.exec(this.d)) this.pos = SEPARATOR.lastIndex;
    }

    atEnd(): boolean {
        this.skipSeparators();
        return this.pos >= this.d.length;
    }

    peek(): string {
        return this.d[this.pos] ?? '';
    }

    atNumber(): boolean {
        if (this.atEnd()) return false;
        NUMBER.lastIndex = this.pos;
        return NUMBER.test(this.d);
    }

    readCommand(): string {
        const ch = this.peek();
        if (/[a-zA-Z]/.test(ch)) {
            this.pos++;
            return ch;
        }
        throw new ParseError(`unexpected "${ch}" at offset ${this.pos} in path data`, this.context);
    }

    readNumber(): number {
        this.skipSeparators();
        NUMBER.lastIndex = this.pos;
        const match = NUMBER.exec(this.d);
        if (!match) {
            const found = this.pos < this.d.length ? `"${this.peek()}"` : 'end of data';
            throw new ParseError(`expected a number at offset ${this.pos} in path data, found ${found}`, this.context);
        }
        this.pos = NUMBER.lastIndex;
        return parseFloat(match[0]);
    }

    // Arc flags are single characters and may be packed without separators ("a5 5 0 0110 10")
    readFlag(): boolean {
        this.skipSeparators();
        const ch = this.peek();
        if (ch !== '0' && ch !== '1') {
            throw new ParseError(`expected an arc flag at offset ${this.pos} in path data`, this.context);
        }
        this.pos++;
        return ch === '1';
    }
}

function readArgs(scanner: PathDataScanner, code: CommandCode, relative: boolean): PathCommand {
    switch (code) {
        case 'M': case 'L': case 'T':
            return { code, relative, x: scanner.readNumber(), y: scanner.readNumber() };
        case 'H':
            return { code, relative, x: scanner.readNumber() };
        case 'V':
            return { code, relative, y: scanner.readNumber() };
        case 'C':
            return {
                code, relative,
                x1: scanner.readNumber(), y1: scanner.readNumber(),
                x2: scanner.readNumber(), y2: scanner.readNumber(),
                x: scanner.readNumber(), y: scanner.readNumber(),
            };
        case 'S':
            return { code, relative, x2: scanner.readNumber(), y2: scanner.readNumber(), x: scanner.readNumber(), y: scanner.readNumber() };
        case 'Q':
            return { code, relative, x1: scanner.readNumber(), y1: scanner.readNumber(), x: scanner.readNumber(), y: scanner.readNumber() };
        case 'A':
            return {
                code, relative,
                rx: scanner.readNumber(), ry: scanner.readNumber(), rotation: scanner.readNumber(),
                largeArc: scanner.readFlag(), sweep: scanner.readFlag(),
                x: scanner.readNumber(), y: scanner.readNumber(),
            };
        case 'Z':
            return { code };
    }
}

/**
 * Tokenise SVG path data into one command per argument group. Repeated groups after a
 * move become line-tos, matching how renderers read "M0 0 10 10".
 */
export function parsePathData(d: string, context: ErrorContext = {}): PathCommand[] {
    const scanner = new PathDataScanner(d, context);
    const commands: PathCommand[] = [];

    while (!scanner.atEnd()) {
        const letter = scanner.readCommand();
        const code = letter.toUpperCase();
        if (!isCommandCode(code)) {
            throw new UnsupportedElementError(`unsupported path command "${letter}"`, context);
        }
        if (commands.length === 0 && code !== 'M') {
            throw new ParseError(`path data must start with a move, found "${letter}"`, context);
        }
        const relative = letter !== code;

        if (ARITY[code] === 0) {
            commands.push({ code: 'Z' });
            continue;
        }

        commands.push(readArgs(scanner, code, relative));
        // Implicit repetition: M/m continues as L/l
        const repeatCode: CommandCode = code === 'M' ? 'L' : code;
        while (scanner.atNumber()) {
            commands.push(readArgs(scanner, repeatCode, relative));
        }
    }

    return commands;
}
