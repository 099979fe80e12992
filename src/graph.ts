// Note:
// A declaration's `span` is what the deletion engine removes, so it covers more than the
// `function ... { ... }` text: `fullStart` reaches back over the NatSpec comments that document
// the function.  `start` is always the `function` keyword.
//
// All offsets index into the JS string holding the file's text, never into re-encoded bytes, so
// `text.slice(start, end)` is always exact.

export interface SourceFile {
    /** Absolute path */
    filename: string;
    text: string;
    /** mtime when `text` was read.  Deletion refuses to write if the file changed since. */
    version: number;
}

export interface Range {
    start: number;
    end: number;
}

export interface Span extends Range {
    fullStart: number;
}

export type Visibility = 'public' | 'external' | 'internal' | 'private' | 'unspecified';
export type StateMutability = 'pure' | 'view' | 'payable' | 'nonpayable';

export interface FunctionDeclaration {
    file: SourceFile;
    name: string;
    /** Offset of the name token; the one occurrence the reference scanner never counts */
    nameStart: number;
    /** From `function` up to, not including, the `{` or `;` that ends the header */
    signatureSpan: Range;
    /** Whole declaration, including leading NatSpec and the body */
    span: Span;
    /** null for interface-style declarations terminated by `;` */
    bodySpan: Range | null;
    visibility: Visibility;
    stateMutability: StateMutability;
    isOverride: boolean;
    isVirtual: boolean;
}

export interface UnusedFinding {
    declaration: FunctionDeclaration;
    referenceCount: 0;
}

export function createSpan(fullStart: number, start: number, end: number): Span {
    return {fullStart, start, end};
}

export function getSpanText(declaration: FunctionDeclaration) {
    return declaration.file.text.slice(declaration.span.fullStart, declaration.span.end);
}
