import Path from 'path';
import { SourceFile } from './graph';
import { getLineNumber } from './util';

export type Log = (msg: string) => void;

export function getLoggableLocation(file: SourceFile, offset: number) {
    const path = getLoggableFilename(file);
    const line = getLineNumber(file.text, offset);
    return `${path}:${line}`;
}

export function getLoggableFilename(file: SourceFile): string;
export function getLoggableFilename(filename: string): string;
export function getLoggableFilename(arg: string | SourceFile) {
    const absFilename = typeof arg === 'string' ? arg : arg.filename;
    return Path.relative(process.cwd(), absFilename) || absFilename;
}
