/**
 * Forward scanner for Solidity source text.
 *
 * Not a full tokenizer: it only knows enough to tell code apart from comments and string
 * literals, and to split code into identifiers, numbers and single punctuation characters.
 * Everything the extractor and the reference scanner need is derived from this token stream.
 */

export enum TokenKind {
    Identifier = 'identifier',
    Number = 'number',
    Punctuation = 'punctuation',
    Comment = 'comment',
    String = 'string',
}

export interface BaseToken {
    start: number;
    end: number;
}
export interface IdentifierToken extends BaseToken {
    kind: TokenKind.Identifier;
    text: string;
}
export interface NumberToken extends BaseToken {
    kind: TokenKind.Number;
}
export interface PunctuationToken extends BaseToken {
    kind: TokenKind.Punctuation;
    char: string;
}
export interface CommentToken extends BaseToken {
    kind: TokenKind.Comment;
    isBlock: boolean;
    /** NatSpec: `///` or `/** *\/` */
    isDoc: boolean;
    unterminated: boolean;
}
export interface StringToken extends BaseToken {
    kind: TokenKind.String;
    unterminated: boolean;
}

export type Token = IdentifierToken | NumberToken | PunctuationToken | CommentToken | StringToken;

const CH_TAB = 9;
const CH_LF = 10;
const CH_CR = 13;
const CH_SPACE = 32;
const CH_DQUOTE = 34;
const CH_DOLLAR = 36;
const CH_SQUOTE = 39;
const CH_STAR = 42;
const CH_DOT = 46;
const CH_SLASH = 47;
const CH_BACKSLASH = 92;
const CH_UNDERSCORE = 95;

export function isWhitespace(ch: number) {
    return ch === CH_SPACE || ch === CH_TAB || ch === CH_LF || ch === CH_CR || ch === 11 || ch === 12;
}

function isDigit(ch: number) {
    return ch >= 48 && ch <= 57;
}

export function isIdentStart(ch: number) {
    return (ch >= 65 && ch <= 90) || (ch >= 97 && ch <= 122) || ch === CH_UNDERSCORE || ch === CH_DOLLAR;
}

export function isIdentChar(ch: number) {
    return isIdentStart(ch) || isDigit(ch);
}

function isQuote(ch: number) {
    return ch === CH_DQUOTE || ch === CH_SQUOTE;
}

/** `hex"..."` and `unicode"..."` are single literals */
const STRING_PREFIXES = new Set(['hex', 'unicode']);

export function* tokenize(source: string): Generator<Token> {
    const len = source.length;
    let pos = 0;
    while(pos < len) {
        const ch = source.charCodeAt(pos);
        if(isWhitespace(ch)) {
            pos++;
            continue;
        }
        const start = pos;
        const next = pos + 1 < len ? source.charCodeAt(pos + 1) : -1;

        if(ch === CH_SLASH && next === CH_SLASH) {
            const isDoc = source.charCodeAt(pos + 2) === CH_SLASH && source.charCodeAt(pos + 3) !== CH_SLASH;
            pos = source.indexOf('\n', pos);
            if(pos === -1) pos = len;
            yield {kind: TokenKind.Comment, start, end: pos, isBlock: false, isDoc, unterminated: false};
            continue;
        }

        if(ch === CH_SLASH && next === CH_STAR) {
            // `/**/` is empty, not a doc comment
            const isDoc = source.charCodeAt(pos + 2) === CH_STAR && source.charCodeAt(pos + 3) !== CH_SLASH;
            const close = source.indexOf('*/', pos + 2);
            pos = close === -1 ? len : close + 2;
            yield {kind: TokenKind.Comment, start, end: pos, isBlock: true, isDoc, unterminated: close === -1};
            continue;
        }

        if(isQuote(ch)) {
            const literal = scanString(source, pos);
            pos = literal.end;
            yield {kind: TokenKind.String, start, end: pos, unterminated: !literal.closed};
            continue;
        }

        if(isIdentStart(ch)) {
            while(pos < len && isIdentChar(source.charCodeAt(pos))) pos++;
            const text = source.slice(start, pos);
            if(STRING_PREFIXES.has(text) && pos < len && isQuote(source.charCodeAt(pos))) {
                const literal = scanString(source, pos);
                pos = literal.end;
                yield {kind: TokenKind.String, start, end: pos, unterminated: !literal.closed};
                continue;
            }
            yield {kind: TokenKind.Identifier, start, end: pos, text};
            continue;
        }

        if(isDigit(ch)) {
            // 0x1f, 1e18, 1_000, 2.5
            while(pos < len) {
                const c = source.charCodeAt(pos);
                if(isIdentChar(c) || (c === CH_DOT && isDigit(source.charCodeAt(pos + 1)))) pos++;
                else break;
            }
            yield {kind: TokenKind.Number, start, end: pos};
            continue;
        }

        pos++;
        yield {kind: TokenKind.Punctuation, start, end: pos, char: source[start]};
    }
}

/**
 * Scans the literal starting at `start`.
 * Solidity strings cannot contain raw newlines, so an unclosed literal stops at the end of its line.
 */
function scanString(source: string, start: number): {end: number; closed: boolean} {
    const quote = source.charCodeAt(start);
    let pos = start + 1;
    while(pos < source.length) {
        const c = source.charCodeAt(pos);
        if(c === CH_LF || c === CH_CR) return {end: pos, closed: false};
        if(c === CH_BACKSLASH) {
            pos += 2;
            continue;
        }
        if(c === quote) return {end: pos + 1, closed: true};
        pos++;
    }
    return {end: source.length, closed: false};
}

/** Tokens that are code, i.e. not comments or string literals */
export function isCodeToken(token: Token): token is IdentifierToken | NumberToken | PunctuationToken {
    return token.kind !== TokenKind.Comment && token.kind !== TokenKind.String;
}
