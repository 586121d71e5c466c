/**
 * SDKs expose response headers either as a fetch `Headers` object or as a
 * plain record depending on their major version.
 */
export function readHeader(headers: unknown, name: string): string | undefined {
    if (!headers || typeof headers !== 'object') return undefined;
    if ('get' in headers && typeof headers.get === 'function') {
        const value: unknown = headers.get(name);
        return typeof value === 'string' ? value : undefined;
    }
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === wanted && typeof value === 'string') {
            return value;
        }
    }
    return undefined;
}
