export type Point = { x: number; y: number };

export type CoordinateSpace = 'source' | 'device';
export type Vertex<S extends CoordinateSpace> = { readonly space: S; readonly x: number; readonly y: number };

// SVG matrix() order: x' = a*x + c*y + e, y' = b*x + d*y + f
export type Matrix = readonly [number, number, number, number, number, number];

export type PathCommand =
    | { code: 'M' | 'L' | 'T'; relative: boolean; x: number; y: number }
    | { code: 'H'; relative: boolean; x: number }
    | { code: 'V'; relative: boolean; y: number }
    | { code: 'C'; relative: boolean; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
    | { code: 'S'; relative: boolean; x2: number; y2: number; x: number; y: number }
    | { code: 'Q'; relative: boolean; x1: number; y1: number; x: number; y: number }
    | { code: 'A'; relative: boolean; rx: number; ry: number; rotation: number; largeArc: boolean; sweep: boolean; x: number; y: number }
    | { code: 'Z' };

type ShapeBase = { readonly transform?: Matrix };

export type ShapePrimitive =
    | ShapeBase & { readonly kind: 'rect'; readonly x: number; readonly y: number; readonly width: number; readonly height: number }
    | ShapeBase & { readonly kind: 'circle'; readonly cx: number; readonly cy: number; readonly r: number }
    | ShapeBase & { readonly kind: 'ellipse'; readonly cx: number; readonly cy: number; readonly rx: number; readonly ry: number }
    | ShapeBase & { readonly kind: 'line'; readonly x1: number; readonly y1: number; readonly x2: number; readonly y2: number }
    | ShapeBase & { readonly kind: 'polyline'; readonly points: readonly Point[] }
    | ShapeBase & { readonly kind: 'polygon'; readonly points: readonly Point[] }
    | ShapeBase & { readonly kind: 'path'; readonly commands: readonly PathCommand[] };

export type ShapeKind = ShapePrimitive['kind'];
export type ShapeOfKind<K extends ShapeKind> = Extract<ShapePrimitive, { kind: K }>;

export type ShapeDocument = { width: number; height: number; shapes: readonly ShapePrimitive[] };

export type BezierSegment = { p0: Point; p1: Point; p2: Point; p3: Point };

// shapeIndex/kind name the shape a stroke came from, for error context
export type Subpath = { shapeIndex: number; kind: ShapeKind; segments: BezierSegment[]; closed: boolean };

export type FlatSubpath<S extends CoordinateSpace> = { shapeIndex: number; kind: ShapeKind; vertices: Vertex<S>[]; closed: boolean };

export type BoundingBox = { min: Point; max: Point };

export type BoundsWarning = { shapeIndex: number; subpathIndex: number; clampedVertices: number };

export type MotionKind = 'travel' | 'engage' | 'draw' | 'disengage';
export type MotionCommand = { kind: MotionKind; target: Vertex<'device'> };

export type ToolpathDocument = {
    commands: MotionCommand[];
    commandCount: number;
    vertexCount: number;
    boundingBox: BoundingBox | null;
    warnings: BoundsWarning[];
};

export type ConversionMetadata = {
    commandCount: number;
    vertexCount: number;
    boundingBox: BoundingBox | null;
    scale: number;
    warnings: BoundsWarning[];
};

export type ConversionResult = { gcode: string; document: ToolpathDocument; metadata: ConversionMetadata };

export const sourceVertex = (p: Point): Vertex<'source'> => ({ space: 'source', x: p.x, y: p.y });
export const deviceVertex = (x: number, y: number): Vertex<'device'> => ({ space: 'device', x, y });
