import { LoadedConfig } from './config';
import { FunctionDeclaration, SourceFile, UnusedFinding } from './graph';
import { extractDeclarations } from './iterate-declarations';
import { isIgnored } from './ignore';
import { Corpus, findReferences, getSourceFile, loadCorpus, ReferenceLocation } from './references';
import { removeDeclarations } from './snipping';
import { writeSourceFile } from './files';
import { IoFailureError, MalformedSourceError } from './errors';
import { getLoggableFilename, getLoggableLocation, Log } from './logging';
import { createHeadlessUi, ProgressUi } from './ui-state';
import { countLines, getLineNumber } from './util';

let log: Log = console.log;
let logError: Log = console.error;

// Analysis of one file moves through four stages:
// extracted -> filtered -> scanned -> classified

export interface Extracted {
    stage: 'extracted';
    file: SourceFile;
    declarations: FunctionDeclaration[];
}

/** Why a declaration was left out of reference scanning */
export type SkipReason = 'ignored' | 'surface';

export interface SkippedUsage {
    declaration: FunctionDeclaration;
    status: SkipReason;
}
export interface CandidateUsage {
    declaration: FunctionDeclaration;
    status: 'candidate';
}
export interface CountedUsage {
    declaration: FunctionDeclaration;
    status: 'counted';
    references: ReferenceLocation[];
    referenceCount: number;
}
export type DeclarationUsage = SkippedUsage | CountedUsage;

export interface Filtered {
    stage: 'filtered';
    file: SourceFile;
    usage: (SkippedUsage | CandidateUsage)[];
}

export interface Scanned {
    stage: 'scanned';
    file: SourceFile;
    usage: DeclarationUsage[];
}

export interface Classified {
    stage: 'classified';
    file: SourceFile;
    /** One entry per declaration, in file order */
    usage: DeclarationUsage[];
    /** In file order */
    findings: UnusedFinding[];
}

export interface FilterPolicy {
    ignorePatterns: RegExp[];
    /** When false, public, external and override functions are never candidates */
    includePublic: boolean;
}

export function extract(file: SourceFile): Extracted {
    return {stage: 'extracted', file, declarations: extractDeclarations(file)};
}

/** Public and external functions can be called by transactions; overrides are reached through their base. */
export function isExternalSurface(declaration: FunctionDeclaration) {
    return declaration.visibility === 'public' || declaration.visibility === 'external' || declaration.isOverride;
}

export function filter(extracted: Extracted, policy: FilterPolicy): Filtered {
    return {
        stage: 'filtered',
        file: extracted.file,
        usage: extracted.declarations.map((declaration): SkippedUsage | CandidateUsage => {
            if(isIgnored(declaration.name, policy.ignorePatterns)) return {declaration, status: 'ignored'};
            if(!policy.includePublic && isExternalSurface(declaration)) return {declaration, status: 'surface'};
            return {declaration, status: 'candidate'};
        }),
    };
}

export function scan(filtered: Filtered, corpus: Corpus): Scanned {
    return {
        stage: 'scanned',
        file: filtered.file,
        usage: filtered.usage.map((u): DeclarationUsage => {
            if(u.status !== 'candidate') return u;
            const references = findReferences(u.declaration, corpus);
            return {declaration: u.declaration, status: 'counted', references, referenceCount: references.length};
        }),
    };
}

export function classify(scanned: Scanned): Classified {
    const findings: UnusedFinding[] = [];
    for(const u of scanned.usage) {
        if(u.status === 'counted' && u.referenceCount === 0) {
            findings.push({declaration: u.declaration, referenceCount: 0});
        }
    }
    return {stage: 'classified', file: scanned.file, usage: scanned.usage, findings};
}

/** Throws `MalformedSourceError` when the file cannot be split into declarations */
export function analyzeFile(file: SourceFile, corpus: Corpus, policy: FilterPolicy): Classified {
    return classify(scan(filter(extract(file), policy), corpus));
}

export type FileFailure = MalformedSourceError | IoFailureError;

export interface FileResult {
    filename: string;
    /** Absent when the file could not be read or parsed */
    classified?: Classified;
    deleted: FunctionDeclaration[];
    error?: FileFailure;
}

export interface RunResult {
    files: FileResult[];
    /** Per-file failures, including files under the root that could not be read */
    failures: FileFailure[];
    totalUnused: number;
    totalDeleted: number;
}

export interface RunOptions {
    log?: Log;
    logError?: Log;
    ui?: ProgressUi;
}

/**
 * Analyze every target, report its unused functions, and delete them when configured to.
 * Configuration errors (bad root) reject; per-file failures are reported and collected in the result.
 */
export async function runVacuum(config: LoadedConfig, options: RunOptions = {}): Promise<RunResult> {
    log = options.log ?? console.log;
    logError = options.logError ?? console.error;
    const ui = options.ui ?? createHeadlessUi();
    const policy: FilterPolicy = {ignorePatterns: config.ignorePatterns, includePublic: config.includePublic};

    for(const warning of config.warnings) log(warning);

    ui.state.currentAction = `Reading Solidity files under ${getLoggableFilename(config.rootAbs)}`;
    const corpus = await loadCorpus(config.rootAbs);
    ui.state.corpusFileCount = corpus.files.size;
    ui.state.targetFileCount = config.targetsGlobbedAbs.length;

    const failures: FileFailure[] = [];
    for(const failure of corpus.failures) {
        reportFailure(failure);
        failures.push(failure);
    }

    const results: FileResult[] = [];
    let totalUnused = 0;
    let totalDeleted = 0;
    for(const filename of config.targetsGlobbedAbs) {
        ui.state.currentAction = `Analyzing ${getLoggableFilename(filename)}`;
        const result: FileResult = {filename, deleted: []};
        results.push(result);
        try {
            const file = getSourceFile(corpus, filename);
            const classified = analyzeFile(file, corpus, policy);
            result.classified = classified;
            reportFile(classified, config.verbose);
            totalUnused += classified.findings.length;
            ui.state.scannedDeclarationCount += classified.usage.filter(u => u.status === 'counted').length;
            ui.state.findingCount += classified.findings.length;

            // Scanning for this file is complete; only now may it be rewritten
            if(config.delete && classified.findings.length > 0) {
                result.deleted = deleteFindings(classified);
                totalDeleted += result.deleted.length;
            }
        } catch(e: unknown) {
            if(!(e instanceof MalformedSourceError || e instanceof IoFailureError)) throw e;
            result.error = e;
            // Unreadable files under the root were already reported
            if(!failures.includes(e)) {
                failures.push(e);
                reportFailure(e);
            }
        }
        ui.state.analyzedFileCount++;
        if(ui.occasionallyAwait()) await null;
    }

    log(`\nTotal unused functions found: ${totalUnused}`);
    if(config.delete) log(`Total unused functions removed: ${totalDeleted}`);
    if(failures.length > 0) logError(`${failures.length} file(s) failed.`);
    ui.state.currentAction = 'Done';

    return {files: results, failures, totalUnused, totalDeleted};
}

/** Rewrite the file without its unused declarations.  Returns what was removed. */
function deleteFindings(classified: Classified) {
    const {file, findings} = classified;
    const declarations = findings.map(f => f.declaration);
    const sourceAfter = removeDeclarations(file.text, declarations);
    writeSourceFile(file, sourceAfter);
    for(const declaration of declarations) {
        log(`Removed function: ${declaration.name}`);
    }
    const linesRemoved = countLines(file.text) - countLines(sourceAfter);
    log(`Updated ${getLoggableFilename(file)} with unused functions removed (${linesRemoved} lines).`);
    return declarations;
}

function reportFile(classified: Classified, verbose: boolean) {
    const {file, usage, findings} = classified;
    const filename = getLoggableFilename(file);
    log(`\nFunction Usage Report for ${filename}:`);
    for(const u of usage) {
        const name = u.declaration.name;
        if(u.status === 'ignored') {
            log(`${name}: ignored`);
        } else if(u.status === 'surface') {
            log(`${name}: external surface`);
        } else if(u.status === 'counted') {
            log(`${name}: ${u.referenceCount} occurrences`);
            if(verbose) {
                for(const r of u.references) log(`    - REF ${getLoggableLocation(r.file, r.offset)}`);
            }
        }
    }

    if(findings.length === 0) {
        log(`\nNo unused functions found in ${filename}.`);
        return;
    }
    log(`\nFunctions marked for removal in ${filename}:`);
    for(const {declaration} of findings) {
        log(`- ${declaration.name} (line ${getLineNumber(file.text, declaration.span.start)})`);
    }
}

function reportFailure(e: FileFailure) {
    if(e instanceof MalformedSourceError) {
        logError(`error: ${getLoggableFilename(e.filename)}:${e.line}: ${e.message}`);
    } else {
        logError(`error: ${e.message}`);
    }
}
