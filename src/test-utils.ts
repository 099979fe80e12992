import fs from 'fs';
import os from 'os';
import Path from 'path';
import { SourceFile } from './graph';
import { addCorpusFile, Corpus } from './references';

export function createSourceFile(text: string, filename = '/project/A.sol'): SourceFile {
    return {filename, text, version: 0};
}

/** In-memory corpus rooted at /project */
export function createCorpus(files: Record<string, string>): Corpus {
    const corpus: Corpus = {root: '/project', files: new Map(), failures: []};
    for(const [name, text] of Object.entries(files)) {
        addCorpusFile(corpus, createSourceFile(text, `/project/${name}`));
    }
    return corpus;
}

/** Write `files` into a fresh temporary directory and return its path */
export function createProjectDir(files: Record<string, string>): string {
    const dir = fs.realpathSync(fs.mkdtempSync(Path.join(os.tmpdir(), 'sol-vacuum-')));
    for(const [name, text] of Object.entries(files)) {
        const filename = Path.join(dir, name);
        fs.mkdirSync(Path.dirname(filename), {recursive: true});
        fs.writeFileSync(filename, text);
    }
    return dir;
}

export function removeProjectDir(dir: string) {
    fs.rmSync(dir, {recursive: true, force: true});
}

export function lines(...l: string[]) {
    return l.join('\n');
}
