import assert from 'assert';
import { createSpan, FunctionDeclaration, Range, SourceFile, StateMutability, Visibility } from './graph';
import { CommentToken, IdentifierToken, isCodeToken, isWhitespace, PunctuationToken, Token, TokenKind, tokenize } from './lexer';
import { MalformedSourceError } from './errors';
import { getLineNumber } from './util';

const VISIBILITIES = ['public', 'external', 'internal', 'private'] as const;
const MUTABILITIES = ['pure', 'view', 'payable'] as const;
/** Callables that are never reported, but whose bodies may hold Yul functions */
const OTHER_CALLABLES = ['constructor', 'modifier', 'fallback', 'receive'] as const;

/**
 * Iterate `function` declarations in file order, whether they have a body or are
 * interface-style declarations ending in `;`.
 *
 * Scanning resumes after each declaration's closing brace, so functions nested inside a body
 * (Yul functions in an `assembly` block) are part of their parent, never declarations of their own.
 * Constructor, modifier, fallback and receive bodies are skipped the same way.
 */
export function* forEachFunctionDeclaration(file: SourceFile): Iterable<FunctionDeclaration> {
    const tokens = [...tokenize(file.text)];

    const unterminatedComment = tokens.find((t): t is CommentToken => t.kind === TokenKind.Comment && t.unterminated);
    if(unterminatedComment) {
        throw malformed(file, unterminatedComment.start, 'Block comment is never closed');
    }

    let i = 0;
    while(i < tokens.length) {
        const keyword = tokens[i];
        if(keyword.kind === TokenKind.Identifier && isOneOf(OTHER_CALLABLES, keyword.text)) {
            i = skipUnnamed(tokens, i);
            continue;
        }
        if(!isIdentifier(keyword, 'function')) {
            i++;
            continue;
        }
        // `function (uint) external returns (bool)` is a function type, and `function () { ... }`
        // a legacy fallback; neither is a named declaration
        const nameIndex = nextCodeToken(tokens, i + 1);
        const nameToken = nameIndex === -1 ? undefined : tokens[nameIndex];
        if(nameToken?.kind !== TokenKind.Identifier) {
            i = skipUnnamed(tokens, i);
            continue;
        }

        const header = scanHeader(file, tokens, nameIndex, nameToken);
        let end: number;
        let bodySpan: Range | null = null;
        let resumeAt: number;
        if(header.terminator.char === '{') {
            const closeIndex = findMatchingBrace(tokens, header.terminatorIndex);
            if(closeIndex === -1) {
                throw malformed(file, header.terminator.start, `Body of function ${nameToken.text} is never closed`);
            }
            end = tokens[closeIndex].end;
            bodySpan = {start: header.terminator.start, end};
            resumeAt = closeIndex + 1;
        } else {
            end = header.terminator.end;
            resumeAt = header.terminatorIndex + 1;
        }

        const declaration: FunctionDeclaration = {
            file,
            name: nameToken.text,
            nameStart: nameToken.start,
            signatureSpan: {start: keyword.start, end: header.terminator.start},
            span: createSpan(getNatSpecStart(file.text, tokens, i) ?? keyword.start, keyword.start, end),
            bodySpan,
            visibility: header.visibility,
            stateMutability: header.stateMutability,
            isOverride: header.isOverride,
            isVirtual: header.isVirtual,
        };
        assert(declaration.span.fullStart <= declaration.signatureSpan.start && declaration.span.end > declaration.signatureSpan.end);
        yield declaration;
        i = resumeAt;
    }
}

export function extractDeclarations(file: SourceFile): FunctionDeclaration[] {
    return [...forEachFunctionDeclaration(file)];
}

interface HeaderInfo {
    terminatorIndex: number;
    terminator: PunctuationToken;
    visibility: Visibility;
    stateMutability: StateMutability;
    isOverride: boolean;
    isVirtual: boolean;
}

/**
 * Walk from the name to the `{` or `;` that ends the header.  Only identifiers outside
 * parentheses are modifiers; the ones inside belong to parameter lists, `returns (...)`
 * or `override(A, B)`.
 */
function scanHeader(file: SourceFile, tokens: Token[], nameIndex: number, nameToken: IdentifierToken): HeaderInfo {
    let visibility: Visibility = 'unspecified';
    let stateMutability: StateMutability = 'nonpayable';
    let isOverride = false;
    let isVirtual = false;
    let parenDepth = 0;
    for(let j = nameIndex + 1; j < tokens.length; j++) {
        const token = tokens[j];
        if(token.kind === TokenKind.Punctuation) {
            if(token.char === '(') parenDepth++;
            else if(token.char === ')') parenDepth = Math.max(0, parenDepth - 1);
            else if(parenDepth === 0 && (token.char === '{' || token.char === ';')) {
                return {terminatorIndex: j, terminator: token, visibility, stateMutability, isOverride, isVirtual};
            } else if(parenDepth === 0 && token.char === '}') {
                break;
            }
        } else if(token.kind === TokenKind.Identifier && parenDepth === 0) {
            if(token.text === 'function') break;
            const text = token.text;
            if(isOneOf(VISIBILITIES, text)) visibility = text;
            else if(isOneOf(MUTABILITIES, text)) stateMutability = text;
            else if(text === 'override') isOverride = true;
            else if(text === 'virtual') isVirtual = true;
        }
    }
    throw malformed(file, nameToken.start, `Header of function ${nameToken.text} is never closed`);
}

/** Index of the `}` closing the `{` at `openIndex`, or -1 */
function findMatchingBrace(tokens: Token[], openIndex: number) {
    let depth = 0;
    for(let j = openIndex; j < tokens.length; j++) {
        const token = tokens[j];
        if(token.kind !== TokenKind.Punctuation) continue;
        if(token.char === '{') depth++;
        else if(token.char === '}') {
            depth--;
            if(depth === 0) return j;
        }
    }
    return -1;
}

/**
 * Index just past the `{ ... }` or `;` ending the unnamed callable or function-typed item at
 * `index`.  A `}` that closes the enclosing scope first, or a body that never closes, ends the
 * skip at the next token.
 */
function skipUnnamed(tokens: Token[], index: number) {
    let parenDepth = 0;
    for(let j = index + 1; j < tokens.length; j++) {
        const token = tokens[j];
        if(token.kind !== TokenKind.Punctuation) continue;
        if(token.char === '(') parenDepth++;
        else if(token.char === ')') parenDepth = Math.max(0, parenDepth - 1);
        else if(parenDepth > 0) continue;
        else if(token.char === ';') return j + 1;
        else if(token.char === '}') break;
        else if(token.char === '{') {
            const closeIndex = findMatchingBrace(tokens, j);
            return closeIndex === -1 ? index + 1 : closeIndex + 1;
        }
    }
    return index + 1;
}

/**
 * Start of the run of NatSpec comments directly above the token at `index`, if any.
 * A doc comment trailing code on its line documents that code, and ends the run.
 */
function getNatSpecStart(text: string, tokens: Token[], index: number) {
    let start: number | undefined;
    for(let k = index - 1; k >= 0; k--) {
        const token = tokens[k];
        if(token.kind !== TokenKind.Comment || !token.isDoc || !startsLine(text, token.start)) break;
        start = token.start;
    }
    return start;
}

/** Only whitespace between the previous line break (or start of input) and `offset` */
function startsLine(text: string, offset: number) {
    for(let k = offset - 1; k >= 0; k--) {
        const ch = text.charCodeAt(k);
        if(ch === 10) return true;
        if(!isWhitespace(ch)) return false;
    }
    return true;
}

function nextCodeToken(tokens: Token[], from: number) {
    for(let j = from; j < tokens.length; j++) {
        if(isCodeToken(tokens[j])) return j;
    }
    return -1;
}

function isIdentifier(token: Token, text: string): token is IdentifierToken {
    return token.kind === TokenKind.Identifier && token.text === text;
}

function isOneOf<T extends string>(values: readonly T[], text: string): text is T {
    return values.some(v => v === text);
}

function malformed(file: SourceFile, offset: number, message: string) {
    return new MalformedSourceError(file.filename, message, offset, getLineNumber(file.text, offset));
}
