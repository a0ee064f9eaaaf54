export { convert } from './compiler';
export { toolpathCoordinates, toolpathDeviation } from './deviation';
export type { Coordinate, Deviation } from './deviation';
export { emitToolpath, renderCommand, renderToolpath } from './emitter';
export { BoundsError, ConversionError, GeometryError, ParseError, SettingsError, UnsupportedElementError } from './errors';
export type { ErrorContext } from './errors';
export { MAX_SUBDIVISION_DEPTH, flattenSegment, flattenSubpath, splitSegment } from './flattener';
export { mapToDevice, resolveScale } from './mapper';
export type { BoundsPolicy, MappingParams } from './mapper';
export { normalizeDocument, normalizeShape } from './normalizer';
export { arcToBeziers } from './arc';
export { parsePathData } from './pathData';
export { DEFAULT_SETTINGS, loadSettingsFile, resolveSettings } from './settings';
export type { Settings, SettingsPayload } from './settings';
export { convertSvgFile } from './service';
export type { ConvertFileResult } from './service';
export { parseSvgDocument } from './svgParser';
export { parseTransform } from './transform';
export * from './types';
