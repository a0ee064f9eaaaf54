import * as fs from 'fs';
import { SettingsError } from './errors';
import { MAX_SUBDIVISION_DEPTH } from './flattener';
import { BoundsPolicy } from './mapper';

export type Settings = {
    readonly bedMaxX: number;
    readonly bedMaxY: number;
    readonly flatnessTolerance: number;
    readonly scale: number | 'auto';
    readonly boundsPolicy: BoundsPolicy;
    readonly maxSubdivisionDepth: number;
    readonly precision: number;
    readonly preamble: string;
    readonly postamble: string;
    readonly travelTemplate: string;
    readonly drawTemplate: string;
    readonly engageTemplate: string;
    readonly disengageTemplate: string;
};

export type SettingsPayload = Record<string, unknown>;

export const DEFAULT_SETTINGS: Settings = Object.freeze<Settings>({
    bedMaxX: 200,
    bedMaxY: 200,
    flatnessTolerance: 0.2,
    scale: 'auto',
    boundsPolicy: 'clamp',
    maxSubdivisionDepth: MAX_SUBDIVISION_DEPTH,
    precision: 1,
    preamble: 'G28\nG1 Z5.0\nG4 P200',
    postamble: 'G28',
    travelTemplate: 'G0 X{x} Y{y}',
    drawTemplate: 'G1 X{x} Y{y}',
    engageTemplate: 'M03',
    disengageTemplate: 'M05',
});

const KNOWN_KEYS = new Set(Object.keys(DEFAULT_SETTINGS));

function positiveNumber(field: string, value: unknown): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new SettingsError(field, `expected a positive number, got ${JSON.stringify(value)}`);
    }
    return value;
}

function integerInRange(field: string, value: unknown, min: number, max: number): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
        throw new SettingsError(field, `expected an integer from ${min} to ${max}, got ${JSON.stringify(value)}`);
    }
    return value;
}

function text(field: string, value: unknown): string {
    if (typeof value !== 'string') throw new SettingsError(field, `expected a string, got ${JSON.stringify(value)}`);
    return value;
}

/**
 * Merge overrides onto the defaults and validate every field. The result is frozen and is
 * the only configuration a conversion sees.
 */
export function resolveSettings(overrides: SettingsPayload = {}): Settings {
    for (const key of Object.keys(overrides)) {
        if (!KNOWN_KEYS.has(key)) throw new SettingsError(key, 'unknown setting');
    }
    const merged: SettingsPayload = { ...DEFAULT_SETTINGS, ...overrides };

    const scale = merged.scale === 'auto' ? 'auto' : positiveNumber('scale', merged.scale);
    const boundsPolicy = merged.boundsPolicy;
    if (boundsPolicy !== 'clamp' && boundsPolicy !== 'reject') {
        throw new SettingsError('boundsPolicy', `expected "clamp" or "reject", got ${JSON.stringify(boundsPolicy)}`);
    }

    return Object.freeze<Settings>({
        bedMaxX: positiveNumber('bedMaxX', merged.bedMaxX),
        bedMaxY: positiveNumber('bedMaxY', merged.bedMaxY),
        flatnessTolerance: positiveNumber('flatnessTolerance', merged.flatnessTolerance),
        scale,
        boundsPolicy,
        maxSubdivisionDepth: integerInRange('maxSubdivisionDepth', merged.maxSubdivisionDepth, 1, 32),
        precision: integerInRange('precision', merged.precision, 0, 6),
        preamble: text('preamble', merged.preamble),
        postamble: text('postamble', merged.postamble),
        travelTemplate: text('travelTemplate', merged.travelTemplate),
        drawTemplate: text('drawTemplate', merged.drawTemplate),
        engageTemplate: text('engageTemplate', merged.engageTemplate),
        disengageTemplate: text('disengageTemplate', merged.disengageTemplate),
    });
}

const isPayload = (value: unknown): value is SettingsPayload => typeof value === 'object' && value !== null && !Array.isArray(value);

/** Read a JSON settings file and resolve it against the defaults. */
export function loadSettingsFile(filePath: string): Settings {
    let data: string;
    try {
        data = fs.readFileSync(filePath, 'utf-8');
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SettingsError('file', `cannot read ${filePath}: ${message}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(data);
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SettingsError('file', `${filePath} is not valid JSON: ${message}`);
    }
    if (!isPayload(parsed)) throw new SettingsError('file', `${filePath} must contain a JSON object`);
    return resolveSettings(parsed);
}
