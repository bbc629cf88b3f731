import cac from 'cac';
import { version } from '../package.json';
import { CompactCodec } from './codec/CompactCodec';
import { debugPacket, parseHex } from './debug';
import { LATEST_KEY_VERSION } from './dictionary/KeyDictionary';
import { LATEST_PATH_VERSION } from './dictionary/PathDictionary';
import { PathMatcher } from './path/PathMatcher';
import { isJsonObject } from './validation';

export interface CliOutput {
    log(message: string): void;
    error(message: string): void;
}

interface VersionFlags {
    protocolVersion?: number | string;
    codecVersion?: number | string;
}

interface MapPathFlags extends VersionFlags {
    port?: number | string;
}

function toVersion(value: number | string | undefined, fallback: number): number {
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new Error(`Not an integer version: ${value}`);
    }
    return parsed;
}

function toHex(bytes: Uint8Array): string {
    return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Builds the command-line interface. Output goes through `out` so tests can
 * capture it; a failing command sets a non-zero exit code.
 */
export function createCLI(out: CliOutput = console) {
    const cli = cac('matrix-lowbandwidth');

    const run = (action: () => void) => {
        try {
            action();
        } catch (error) {
            out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    };

    cli.option('--protocol-version <version>', 'Path dictionary version', { default: LATEST_PATH_VERSION });
    cli.option('--codec-version <version>', 'Key dictionary version', { default: LATEST_KEY_VERSION });

    cli
        .command('map-path <url>', 'Show the URL a request is sent to over the compact channel')
        .option('--port <port>', 'Compact channel port', { default: 5683 })
        .action((url: string, options: MapPathFlags) => run(() => {
            const matcher = new PathMatcher(toVersion(options.protocolVersion, LATEST_PATH_VERSION));
            const port = Number(options.port ?? 5683);
            out.log(matcher.mapPath(url, port).toString());
        }));

    cli
        .command('expand-path <path>', 'Expand a mapped path back to its endpoint path')
        .action((mappedPath: string, options: VersionFlags) => run(() => {
            const matcher = new PathMatcher(toVersion(options.protocolVersion, LATEST_PATH_VERSION));
            const expanded = matcher.expandPath(mappedPath);
            if (expanded === null) {
                throw new Error(`No endpoint for ${mappedPath} in path dictionary v${matcher.version}`);
            }
            out.log(expanded);
        }));

    cli
        .command('encode <json>', 'Encode a JSON object as a compact body (hex)')
        .action((json: string, options: VersionFlags) => run(() => {
            const codec = new CompactCodec(toVersion(options.codecVersion, LATEST_KEY_VERSION));
            const parsed: unknown = JSON.parse(json);
            if (!isJsonObject(parsed)) {
                throw new Error('Only a JSON object can be encoded');
            }
            const encoded = codec.encode(parsed);
            const jsonSize = new TextEncoder().encode(JSON.stringify(parsed)).length;
            out.log(toHex(encoded));
            out.log(`${encoded.length} bytes compact, ${jsonSize} bytes JSON`);
        }));

    cli
        .command('decode <hex>', 'Decode a compact body (hex) to JSON')
        .action((hex: string, options: VersionFlags) => run(() => {
            const codec = new CompactCodec(toVersion(options.codecVersion, LATEST_KEY_VERSION));
            out.log(JSON.stringify(codec.decode(parseHex(hex))));
        }));

    cli
        .command('inspect <hex>', 'Describe a CoAP datagram (hex)')
        .action((hex: string, options: VersionFlags) => run(() => {
            const codec = new CompactCodec(toVersion(options.codecVersion, LATEST_KEY_VERSION));
            out.log(debugPacket(parseHex(hex), codec));
        }));

    cli.help();
    cli.version(version);
    return cli;
}
