/**
 * Narrowing helpers for the loosely shaped JSON the site embeds
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRecord(value: unknown, key: string): JsonRecord | undefined {
    if (!isRecord(value)) return undefined;
    const child = value[key];
    return isRecord(child) ? child : undefined;
}

export function getArray(value: unknown, key: string): unknown[] | undefined {
    if (!isRecord(value)) return undefined;
    const child = value[key];
    return Array.isArray(child) ? child : undefined;
}

export function getString(value: unknown, key: string): string | undefined {
    if (!isRecord(value)) return undefined;
    const child = value[key];
    return typeof child === 'string' && child.length > 0 ? child : undefined;
}

/**
 * Numbers that arrive either as numbers or numeric strings
 */
export function getNumber(value: unknown, key: string): number | undefined {
    if (!isRecord(value)) return undefined;
    const child = value[key];
    if (typeof child === 'number' && Number.isFinite(child)) {
        return child;
    }
    if (typeof child === 'string' && /^\d+(\.\d+)?$/.test(child)) {
        return Number(child);
    }
    return undefined;
}

/**
 * Visit every object under root, depth first, parents before children
 */
export function walkRecords(root: unknown, visit: (record: JsonRecord) => void, maxDepth: number = 64): void {
    const walk = (node: unknown, depth: number): void => {
        if (depth > maxDepth) return;

        if (Array.isArray(node)) {
            node.forEach(item => walk(item, depth + 1));
            return;
        }

        if (isRecord(node)) {
            visit(node);
            Object.values(node).forEach(child => walk(child, depth + 1));
        }
    };

    walk(root, 0);
}

export function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Slice the JSON object or array starting at text[start], honouring
 * strings and escapes. Undefined when it never closes.
 */
export function sliceBalanced(text: string, start: number): string | undefined {
    const open = text[start];
    if (open !== '{' && open !== '[') return undefined;

    let depth = 0;
    let inString = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (inString) {
            if (char === '\\') {
                i++;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === '{' || char === '[') {
            depth++;
        } else if (char === '}' || char === ']') {
            depth--;
            if (depth === 0) {
                return text.slice(start, i + 1);
            }
        }
    }

    return undefined;
}
