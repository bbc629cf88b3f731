import pathTable from './paths.json';
import { clampVersion, foldGenerations, invert, latestVersion, type Generation } from './generations';

/**
 * REST path templates and the short symbols that replace them on the compact channel.
 * Declaration order within a generation is the matching order.
 */
export const PATH_GENERATIONS: ReadonlyArray<Generation<string, string>> = pathTable.generations.map(g => ({
    version: g.version,
    entries: g.paths.map(p => [p.template, p.symbol] as const),
}));

export const LATEST_PATH_VERSION = latestVersion(PATH_GENERATIONS);

export class PathDictionary {
    readonly version: number;
    /** template → symbol, in matching order */
    readonly templates: ReadonlyMap<string, string>;
    /** symbol → template */
    readonly symbols: ReadonlyMap<string, string>;

    constructor(
        version: number = LATEST_PATH_VERSION,
        generations: ReadonlyArray<Generation<string, string>> = PATH_GENERATIONS
    ) {
        this.version = clampVersion(version, latestVersion(generations));
        this.templates = foldGenerations(generations, this.version);
        this.symbols = invert(this.templates);
    }
}
