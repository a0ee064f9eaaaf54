#!/usr/bin/env node
import { SettingsError } from './errors';
import { Settings, loadSettingsFile, resolveSettings } from './settings';
import { convertSvgFile } from './service';

type CliOptions = { inputFile: string; outputFile?: string; settingsFile?: string; verbose: boolean };

function printUsage(): void {
    console.log('Usage: plotline input.svg [output.gcode] [--settings settings.json] [--verbose]');
    console.log('  input.svg:     Path to input SVG file');
    console.log('  output.gcode:  Path to output file (default: gcode_output/<name>.gcode beside the input)');
    console.log('  --settings:    JSON file with bed size, tolerance, scale and command templates');
    console.log('  --verbose:     Print per-conversion details');
}

export function parseArgs(args: string[]): CliOptions | null {
    const positional: string[] = [];
    let settingsFile: string | undefined;
    let verbose = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--verbose') {
            verbose = true;
        } else if (arg === '--settings') {
            settingsFile = args[++i];
            if (settingsFile === undefined) return null;
        } else if (arg.startsWith('--')) {
            return null;
        } else {
            positional.push(arg);
        }
    }

    if (positional.length < 1 || positional.length > 2) return null;
    return { inputFile: positional[0], outputFile: positional[1], settingsFile, verbose };
}

export function main(args: string[] = process.argv.slice(2)): number {
    const options = parseArgs(args);
    if (!options) {
        printUsage();
        return 1;
    }

    let settings: Settings;
    try {
        settings = options.settingsFile ? loadSettingsFile(options.settingsFile) : resolveSettings();
    } catch (error: unknown) {
        if (error instanceof SettingsError) {
            console.error(error.message);
            return 1;
        }
        throw error;
    }

    if (options.verbose) {
        console.log(`Input File: ${options.inputFile}`);
        console.log(`Bed: ${settings.bedMaxX}x${settings.bedMaxY}, tolerance: ${settings.flatnessTolerance}, scale: ${settings.scale}`);
    }

    const result = convertSvgFile(options.inputFile, settings, options.outputFile);
    if (result.status === 'error') {
        console.error(`${result.errorType}: ${result.message}`);
        return 1;
    }

    const { metadata } = result;
    if (options.verbose) {
        console.log(`Scale: ${metadata.scale}`);
        console.log(`Commands: ${metadata.commandCount}, vertices: ${metadata.vertexCount}`);
        if (metadata.boundingBox) {
            const { min, max } = metadata.boundingBox;
            console.log(`Bounding box: (${min.x}, ${min.y}) - (${max.x}, ${max.y})`);
        }
    }
    for (const warning of metadata.warnings) {
        console.error(`Warning: shape #${warning.shapeIndex} had ${warning.clampedVertices} vertices clamped to the bed`);
    }
    console.log(`G-code saved to: ${result.outputPath}`);
    return 0;
}

// If this file is run directly (not imported), execute main function
if (require.main === module) {
    process.exitCode = main();
}
