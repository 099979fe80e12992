/** 1-based line number of `offset` */
export function getLineNumber(text: string, offset: number) {
    let line = 1;
    let pos = text.indexOf('\n');
    while(pos !== -1 && pos < offset) {
        line++;
        pos = text.indexOf('\n', pos + 1);
    }
    return line;
}

export function countLines(text: string) {
    return text.split('\n').length;
}
