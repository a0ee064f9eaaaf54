import * as fs from 'fs';
import * as path from 'path';
import { convert } from './compiler';
import { ConversionError, SettingsError } from './errors';
import { Settings } from './settings';
import { ConversionMetadata } from './types';

export type ConvertFileResult =
    | { status: 'success'; outputPath: string; gcode: string; metadata: ConversionMetadata }
    | { status: 'error'; errorType: string; message: string };

/** `gcode_output/<name>.gcode` next to the input file. */
export function defaultOutputPath(filePath: string): string {
    const dir = path.join(path.dirname(filePath), 'gcode_output');
    return path.join(dir, `${path.basename(filePath, path.extname(filePath))}.gcode`);
}

function failure(error: unknown): ConvertFileResult {
    if (error instanceof ConversionError || error instanceof SettingsError) {
        return { status: 'error', errorType: error.name, message: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'error', errorType: 'IOError', message };
}

/** Convert an SVG file on disk and save the machine text. Failures come back as an error result. */
export function convertSvgFile(filePath: string, settings: Settings, outputPath?: string): ConvertFileResult {
    if (!fs.existsSync(filePath)) {
        return { status: 'error', errorType: 'IOError', message: `File "${filePath}" not found.` };
    }
    if (path.extname(filePath).toLowerCase() !== '.svg') {
        return { status: 'error', errorType: 'IOError', message: `File "${filePath}" is not an SVG file.` };
    }

    try {
        const markup = fs.readFileSync(filePath, 'utf8');
        const { gcode, metadata } = convert(markup, settings);

        const target = outputPath ?? defaultOutputPath(filePath);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, `${gcode}\n`);
        return { status: 'success', outputPath: target, gcode, metadata };
    } catch (error: unknown) {
        return failure(error);
    }
}
