import fs from 'fs';
import { SourceFile } from './graph';
import { IoFailureError } from './errors';
import { getLoggableFilename } from './logging';

export function readSourceFile(filename: string): SourceFile {
    try {
        const text = fs.readFileSync(filename, 'utf8');
        const version = fs.statSync(filename).mtimeMs;
        return {filename, text, version};
    } catch(e: unknown) {
        throw new IoFailureError(filename, `Cannot read ${getLoggableFilename(filename)}`, e);
    }
}

/**
 * Overwrite `file` on disk with `text`.  Refuses when the file was modified or removed after
 * `file` was read, since the spans being removed were computed against that snapshot.
 */
export function writeSourceFile(file: SourceFile, text: string) {
    const loggable = getLoggableFilename(file);
    let currentVersion: number;
    try {
        currentVersion = fs.statSync(file.filename).mtimeMs;
    } catch(e: unknown) {
        throw new IoFailureError(file.filename, `Cannot write ${loggable}`, e);
    }
    if(currentVersion !== file.version) {
        throw new IoFailureError(file.filename, `${loggable} changed on disk after it was analyzed; not rewriting it`);
    }
    try {
        fs.writeFileSync(file.filename, text);
    } catch(e: unknown) {
        throw new IoFailureError(file.filename, `Cannot write ${loggable}`, e);
    }
}
