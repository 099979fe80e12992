import assert from 'assert';
import { sortBy } from 'lodash';
import { FunctionDeclaration, Span } from './graph';

const CH_TAB = 9;
const CH_LF = 10;
const CH_CR = 13;
const CH_SPACE = 32;

function isHorizontalSpace(ch: number) {
    return ch === CH_SPACE || ch === CH_TAB;
}

/**
 * When a span is alone on its lines, widen it to cover those lines entirely, indentation and
 * line break included, so that removing it does not leave a blank line behind.
 * Spans sharing a line with other code are returned unchanged.
 */
export function extendSpanToLines(source: string, span: Span): Span {
    let lineStart = span.fullStart;
    while(lineStart > 0 && isHorizontalSpace(source.charCodeAt(lineStart - 1))) lineStart--;
    if(lineStart > 0 && source.charCodeAt(lineStart - 1) !== CH_LF) return span;

    let lineEnd = span.end;
    while(lineEnd < source.length && isHorizontalSpace(source.charCodeAt(lineEnd))) lineEnd++;
    if(lineEnd < source.length) {
        const ch = source.charCodeAt(lineEnd);
        if(ch === CH_CR && source.charCodeAt(lineEnd + 1) === CH_LF) lineEnd += 2;
        else if(ch === CH_LF) lineEnd++;
        else return span;
    }
    return {fullStart: lineStart, start: span.start, end: lineEnd};
}

/** Sort by start and merge spans that overlap or touch */
export function collapseSpans(spans: Span[]) {
    const sorted = sortBy(spans, span => span.fullStart);
    const collapsed: Span[] = [];
    let previous: Span | undefined = undefined;
    for(const next of sorted) {
        if(previous && previous.end >= next.fullStart) {
            previous = {
                fullStart: previous.fullStart,
                start: previous.start,
                end: Math.max(previous.end, next.end)
            };
            continue;
        }
        if(previous) collapsed.push(previous);
        previous = next;
    }
    if(previous) collapsed.push(previous);
    return collapsed;
}

/**
 * Remove `spans` from `source` in a single pass.  Offsets always refer to the untouched
 * `source`; nothing is re-derived from partially edited text.
 */
export function applyCollapsedEdits(source: string, spans: Span[]) {
    const kept: string[] = [];
    let cursor = 0;
    for(const span of spans) {
        assert(span.fullStart >= cursor && span.end <= source.length, `Spans must be sorted and disjoint: ${span.fullStart}-${span.end}`);
        kept.push(source.slice(cursor, span.fullStart));
        cursor = span.end;
    }
    kept.push(source.slice(cursor));
    return kept.join('');
}

/** Text of the declarations' file with every one of `declarations` cut out */
export function removeDeclarations(source: string, declarations: FunctionDeclaration[]) {
    const spans = declarations.map(d => extendSpanToLines(source, d.span));
    return applyCollapsedEdits(source, collapseSpans(spans));
}
