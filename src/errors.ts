export type ErrorContext = { shapeIndex?: number; kind?: string };

function describe(context: ErrorContext): string {
    const parts: string[] = [];
    if (context.shapeIndex !== undefined) parts.push(`shape #${context.shapeIndex}`);
    if (context.kind) parts.push(`<${context.kind}>`);
    return parts.length > 0 ? `${parts.join(' ')}: ` : '';
}

/**
 * Base class for every failure that aborts a conversion. The message is prefixed with the
 * offending shape so callers can report it as-is.
 */
export class ConversionError extends Error {
    readonly context: ErrorContext;
    readonly detail: string;

    constructor(detail: string, context: ErrorContext = {}) {
        super(describe(context) + detail);
        this.name = new.target.name;
        this.detail = detail;
        this.context = context;
    }
}

/** Markup or attribute values that are not well-formed. */
export class ParseError extends ConversionError {}

/** A recognised element or path command that the compiler does not implement. */
export class UnsupportedElementError extends ConversionError {}

/** A control point or computed vertex is NaN or infinite. */
export class GeometryError extends ConversionError {}

/** A vertex left the bed under the `reject` bounds policy. */
export class BoundsError extends ConversionError {}

export class SettingsError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(`Invalid setting "${field}": ${message}`);
        this.name = 'SettingsError';
        this.field = field;
    }
}
