import fs, { Stats } from 'fs';
import Path from 'path';
import { globby } from '@cspotcode/zx';
import { FunctionDeclaration, SourceFile } from './graph';
import { TokenKind, tokenize } from './lexer';
import { InvalidRootError, IoFailureError } from './errors';
import { readSourceFile } from './files';

export const SOLIDITY_GLOB = '**/*.sol';

export interface CorpusFile {
    file: SourceFile;
    /** Offsets of every identifier token outside comments and strings, keyed by name */
    occurrences: Map<string, number[]>;
}

/**
 * Every Solidity file under the root, read once when the run starts.  Reference counts are
 * always computed against this snapshot, even after the run has rewritten some of the files.
 */
export interface Corpus {
    root: string;
    files: Map<string, CorpusFile>;
    /** Files under the root that could not be read; they contribute no references */
    failures: IoFailureError[];
}

export interface ReferenceLocation {
    file: SourceFile;
    offset: number;
}

export async function loadCorpus(root: string): Promise<Corpus> {
    const rootAbs = Path.resolve(root);
    let stats: Stats;
    try {
        stats = fs.statSync(rootAbs);
    } catch(e: unknown) {
        throw new InvalidRootError(rootAbs, `Root directory ${root} does not exist or cannot be read`, {cause: e});
    }
    if(!stats.isDirectory()) {
        throw new InvalidRootError(rootAbs, `Root ${root} is not a directory`);
    }

    let filenames: string[];
    try {
        filenames = (await globby(SOLIDITY_GLOB, {cwd: rootAbs, absolute: true})).sort();
    } catch(e: unknown) {
        throw new InvalidRootError(rootAbs, `Cannot list Solidity files under ${root}`, {cause: e});
    }
    if(filenames.length === 0) {
        throw new InvalidRootError(rootAbs, `Root directory ${root} contains no Solidity files`);
    }

    const corpus: Corpus = {root: rootAbs, files: new Map(), failures: []};
    for(const filename of filenames) {
        try {
            addCorpusFile(corpus, readSourceFile(filename));
        } catch(e: unknown) {
            if(e instanceof IoFailureError) corpus.failures.push(e);
            else throw e;
        }
    }
    return corpus;
}

export function addCorpusFile(corpus: Corpus, file: SourceFile): CorpusFile {
    const entry: CorpusFile = {file, occurrences: indexOccurrences(file.text)};
    corpus.files.set(file.filename, entry);
    return entry;
}

export function indexOccurrences(text: string) {
    const occurrences = new Map<string, number[]>();
    for(const token of tokenize(text)) {
        if(token.kind !== TokenKind.Identifier) continue;
        let offsets = occurrences.get(token.text);
        if(!offsets) {
            offsets = [];
            occurrences.set(token.text, offsets);
        }
        offsets.push(token.start);
    }
    return occurrences;
}

/**
 * Every occurrence of the declaration's name under the root, except the name token of the
 * declaration itself.  Recursive calls and other overloads sharing the name are included.
 */
export function findReferences(declaration: FunctionDeclaration, corpus: Corpus): ReferenceLocation[] {
    const refs: ReferenceLocation[] = [];
    for(const {file, occurrences} of corpus.files.values()) {
        const offsets = occurrences.get(declaration.name);
        if(!offsets) continue;
        const isOwnFile = file.filename === declaration.file.filename;
        for(const offset of offsets) {
            if(isOwnFile && offset === declaration.nameStart) continue;
            refs.push({file, offset});
        }
    }
    return refs;
}

export function countReferences(declaration: FunctionDeclaration, corpus: Corpus) {
    return findReferences(declaration, corpus).length;
}

/** Snapshot of `filename`, shared with the corpus when the file lives under the root */
export function getSourceFile(corpus: Corpus, filename: string): SourceFile {
    const cached = corpus.files.get(filename);
    if(cached) return cached.file;
    const failure = corpus.failures.find(f => f.filename === filename);
    if(failure) throw failure;
    return readSourceFile(filename);
}
