// src/url_pattern.ts

import type { ParamValue, RouteParams } from './types';

export type ParamType = 'string' | 'int' | 'float' | 'path' | 'uuid';

export interface PatternParameter {
    name: string;
    type: ParamType;
}

// Matches `<name>` and `<type:name>` placeholders.
const PLACEHOLDER = /<(?:([^:>]+):)?([^>]+)>/g;

const TYPE_PATTERNS: Record<ParamType, string> = {
    string: '([^/]+)',
    int: '(\\d+)',
    float: '(\\d+\\.?\\d*)',
    path: '(.+)',
    uuid: '([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})',
};

function toParamType(raw: string | undefined): ParamType {
    switch (raw) {
        case 'int':
        case 'float':
        case 'path':
        case 'uuid':
            return raw;
        default:
            // Unknown types fall back to the plain segment pattern.
            return 'string';
    }
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function hasPlaceholders(template: string): boolean {
    return new RegExp(PLACEHOLDER.source).test(template);
}

function convert(raw: string, type: ParamType): ParamValue | null {
    switch (type) {
        case 'int': {
            const value = Number.parseInt(raw, 10);
            return Number.isSafeInteger(value) ? value : null;
        }
        case 'float': {
            const value = Number.parseFloat(raw);
            return Number.isFinite(value) ? value : null;
        }
        default:
            return raw;
    }
}

/**
 * A route template compiled into an anchored matcher.
 *
 * `/users/<int:id>/files/<path:rest>` matches `/users/7/files/a/b.txt` and yields
 * `{ id: 7, rest: 'a/b.txt' }`. A template without placeholders matches only itself.
 */
export class URLPattern {
    readonly source: string;
    readonly parameters: readonly PatternParameter[];
    private readonly matcher: RegExp | null;

    constructor(template: string) {
        this.source = template;
        const parameters: PatternParameter[] = [];
        let regex = '';
        let lastIndex = 0;

        for (const match of template.matchAll(PLACEHOLDER)) {
            const type = toParamType(match[1]);
            const name = match[2];
            const index = match.index ?? 0;
            if (parameters.some((param) => param.name === name)) {
                throw new Error(`Duplicate parameter "${name}" in route pattern "${template}"`);
            }
            parameters.push({ name, type });
            regex += escapeRegExp(template.slice(lastIndex, index)) + TYPE_PATTERNS[type];
            lastIndex = index + match[0].length;
        }

        this.parameters = parameters;
        this.matcher = parameters.length > 0
            ? new RegExp(`^${regex}${escapeRegExp(template.slice(lastIndex))}$`)
            : null;
    }

    get isDynamic(): boolean {
        return this.matcher !== null;
    }

    // Returns the typed parameters, or null when the path does not match.
    match(path: string): RouteParams | null {
        if (!this.matcher) {
            return path === this.source ? {} : null;
        }
        const match = this.matcher.exec(path);
        if (!match) {
            return null;
        }
        const params: RouteParams = {};
        for (let i = 0; i < this.parameters.length; i++) {
            const { name, type } = this.parameters[i];
            const value = convert(match[i + 1], type);
            if (value === null) {
                return null;
            }
            params[name] = value;
        }
        return params;
    }

    // Reverse routing: substitutes values back into the template.
    build(params: Partial<RouteParams> = {}): string {
        return this.source.replace(PLACEHOLDER, (_placeholder: string, _type: string | undefined, name: string) => {
            const value = params[name];
            if (value === undefined) {
                throw new Error(`Missing value for parameter "${name}" of route "${this.source}"`);
            }
            const type = this.parameters.find((param) => param.name === name)?.type;
            return type === 'path' ? encodeURI(String(value)) : encodeURIComponent(String(value));
        });
    }
}
