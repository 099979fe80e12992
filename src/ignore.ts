import { InvalidPatternError } from './errors';

export const DEFAULT_IGNORE_PATTERNS = ['^test'];

/**
 * Patterns are unanchored: `foo` ignores `setFoo` too.  Anchor with `^` / `$` to match whole names.
 */
export function compileIgnorePatterns(sources: readonly string[]): RegExp[] {
    return sources.map(source => {
        try {
            return new RegExp(source);
        } catch(e: unknown) {
            throw new InvalidPatternError(source, e);
        }
    });
}

export function isIgnored(name: string, patterns: readonly RegExp[]) {
    return patterns.some(pattern => pattern.test(name));
}
