import { emitToolpath, renderToolpath } from './emitter';
import { ParseError } from './errors';
import { flattenSubpath } from './flattener';
import { mapToDevice, resolveScale } from './mapper';
import { normalizeDocument } from './normalizer';
import { Settings } from './settings';
import { parseSvgDocument } from './svgParser';
import { ConversionResult, ShapeDocument } from './types';

/**
 * Compile SVG markup, or an already parsed shape document, into plotter motion commands.
 * Throws ParseError, UnsupportedElementError, GeometryError or BoundsError; no partial
 * output is ever returned.
 */
export function convert(input: string | ShapeDocument, settings: Settings): ConversionResult {
    const document = typeof input === 'string' ? parseSvgDocument(input) : input;
    const { width, height } = document;
    if (!(Number.isFinite(width) && width > 0) || !(Number.isFinite(height) && height > 0)) {
        throw new ParseError(`canvas size must be positive, got ${width}x${height}`);
    }

    const subpaths = normalizeDocument(document);
    const flattened = subpaths.map(subpath => flattenSubpath(subpath, settings.flatnessTolerance, settings.maxSubdivisionDepth));

    const scale = resolveScale(settings.scale, document, settings);
    const mapped = mapToDevice(flattened, {
        scale,
        sourceHeight: document.height,
        bedMaxX: settings.bedMaxX,
        bedMaxY: settings.bedMaxY,
        boundsPolicy: settings.boundsPolicy,
    });

    const toolpath = emitToolpath(mapped.subpaths, mapped.warnings);
    return {
        gcode: renderToolpath(toolpath, settings),
        document: toolpath,
        metadata: {
            commandCount: toolpath.commandCount,
            vertexCount: toolpath.vertexCount,
            boundingBox: toolpath.boundingBox,
            scale,
            warnings: toolpath.warnings,
        },
    };
}
