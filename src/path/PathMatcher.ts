/**
 * Path template matching for the compact channel.
 *
 * Known REST endpoints travel as `/<symbol>/<param1>/<param2>/...` instead of
 * their full path. Unknown endpoints pass through with their path untouched.
 */

import { PathDictionary } from '../dictionary/PathDictionary';

const PLACEHOLDER = /\{\w+\}/g;

export interface PathMatch {
    symbol: string;
    template: string;
    params: string[];
}

interface CompiledTemplate {
    symbol: string;
    template: string;
    regex: RegExp;
}

function escapeRegex(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Turns `/rooms/{roomId}/join` into an anchored regex where each placeholder
 * captures one run of characters without `/`.
 */
export function buildTemplateRegex(template: string): RegExp {
    const parts = template.split(PLACEHOLDER).map(escapeRegex);
    return new RegExp(`^${parts.join('([^/]*)')}$`);
}

function safeDecode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

/**
 * Escapes a decoded parameter so it survives as a single path segment.
 * Only `%` and `/` are escaped; everything else stays literal.
 */
export function escapeParam(param: string): string {
    return param.replace(/%/g, '%25').replace(/\//g, '%2F');
}

export class PathMatcher {
    readonly dictionary: PathDictionary;
    private readonly compiled: CompiledTemplate[];

    constructor(versionOrDictionary: number | PathDictionary = new PathDictionary()) {
        this.dictionary = typeof versionOrDictionary === 'number'
            ? new PathDictionary(versionOrDictionary)
            : versionOrDictionary;
        this.compiled = Array.from(this.dictionary.templates, ([template, symbol]) => ({
            symbol,
            template,
            regex: buildTemplateRegex(template),
        }));
    }

    get version(): number {
        return this.dictionary.version;
    }

    /**
     * First template, in dictionary order, matching the raw (still percent-encoded) path.
     * Captured parameters are returned percent-decoded.
     */
    matchPath(path: string): PathMatch | null {
        for (const { symbol, template, regex } of this.compiled) {
            const match = regex.exec(path);
            if (match) {
                return { symbol, template, params: match.slice(1).map(safeDecode) };
            }
        }
        return null;
    }

    /**
     * Rewrites a request URL for the compact channel: the port becomes
     * `port`, and a matched path becomes `/<symbol>/<params...>`.
     */
    mapPath(url: URL | string, port: number): URL {
        const mapped = new URL(url);
        mapped.port = String(port);
        const match = this.matchPath(mapped.pathname);
        if (match) {
            mapped.pathname = ['', match.symbol, ...match.params.map(escapeParam)].join('/');
        }
        return mapped;
    }

    /**
     * Inverse of `mapPath` for a mapped pathname. Returns null for a symbol
     * this dictionary version does not know, or a wrong parameter count.
     */
    expandPath(mappedPath: string): string | null {
        const [, symbol, ...segments] = mappedPath.split('/');
        if (symbol === undefined) return null;
        const template = this.dictionary.symbols.get(safeDecode(symbol));
        if (template === undefined) return null;

        const params = segments.map(safeDecode);
        const expected = template.match(PLACEHOLDER)?.length ?? 0;
        if (params.length !== expected) return null;

        let index = 0;
        return template.replace(PLACEHOLDER, () => encodeURIComponent(params[index++] ?? ''));
    }
}

/**
 * Splits a mapped pathname into the decoded segments carried as Uri-Path options.
 */
export function toPathSegments(pathname: string): string[] {
    if (pathname === '' || pathname === '/') return [];
    return pathname.replace(/^\//, '').split('/').map(safeDecode);
}
