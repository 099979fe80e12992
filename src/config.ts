import Path from 'path';
import fs from 'fs';
import { defaults, uniq } from 'lodash';
import { globby } from '@cspotcode/zx';
import { describeError, UsageError } from './errors';
import { compileIgnorePatterns, DEFAULT_IGNORE_PATTERNS } from './ignore';
import { SOLIDITY_GLOB } from './references';

export interface Config {
    /** Solidity files to analyze */
    files?: string[];
    /** Directories searched recursively for Solidity files to analyze */
    dirs?: string[];
    /** Every Solidity file under this directory is searched for references.  Defaults to `.` */
    root?: string;
    /** Rewrite analyzed files with their unused functions removed */
    delete?: boolean;
    /** Regular expressions; functions whose name matches one are never reported.  Defaults to `^test` */
    ignore?: string[];
    /** Also report public, external and override functions.  Off by default: they are callable from outside the project. */
    includePublic?: boolean;
    /** Log every reference found */
    verbose?: boolean;
}

export interface LoadedConfig extends Required<Config> {
    basedir: string;
    targetsGlobbedAbs: string[];
    rootAbs: string;
    ignorePatterns: RegExp[];
    /** Non-fatal problems found while loading, e.g. a target without a `.sol` extension */
    warnings: string[];
}

export const DEFAULT_CONFIG: Required<Config> = {
    files: [],
    dirs: [],
    root: '.',
    delete: false,
    ignore: DEFAULT_IGNORE_PATTERNS,
    includePublic: false,
    verbose: false,
};

/**
 * Read a config file, either JSON or a module exporting `config`, `default`, or the config itself.
 * Relative paths in it are resolved against the file's own directory.
 */
export function readConfig(configPath: string, cwd: string = process.cwd()): Config {
    const configPathAbs = Path.resolve(cwd, configPath);
    let configModule: unknown;
    try {
        configModule = Path.extname(configPathAbs) === '.json'
            ? JSON.parse(fs.readFileSync(configPathAbs, 'utf8'))
            : require(configPathAbs);
    } catch(e: unknown) {
        throw new UsageError(`Cannot load config ${configPath}: ${describeError(e)}`);
    }
    const config = parseConfig(unwrapModule(configModule), configPath);
    const basedir = Path.dirname(configPathAbs);
    return {
        ...config,
        files: config.files?.map(f => Path.resolve(basedir, f)),
        dirs: config.dirs?.map(d => Path.resolve(basedir, d)),
        root: config.root === undefined ? undefined : Path.resolve(basedir, config.root),
    };
}

function unwrapModule(configModule: unknown): unknown {
    if(isRecord(configModule)) {
        return configModule.config ?? configModule.default ?? configModule;
    }
    return configModule;
}

export function parseConfig(value: unknown, source: string): Config {
    if(!isRecord(value)) {
        throw new UsageError(`${source}: config must be an object`);
    }
    const config: Config = {};
    for(const key of ['files', 'dirs', 'ignore'] as const) {
        const v = value[key];
        if(v === undefined) continue;
        if(!Array.isArray(v) || !v.every((s): s is string => typeof s === 'string')) {
            throw new UsageError(`${source}: "${key}" must be an array of strings`);
        }
        config[key] = v;
    }
    if(value.root !== undefined) {
        if(typeof value.root !== 'string') throw new UsageError(`${source}: "root" must be a string`);
        config.root = value.root;
    }
    for(const key of ['delete', 'includePublic', 'verbose'] as const) {
        const v = value[key];
        if(v === undefined) continue;
        if(typeof v !== 'boolean') throw new UsageError(`${source}: "${key}" must be a boolean`);
        config[key] = v;
    }
    return config;
}

/** Earlier configs win; unset values fall through to later ones and finally to the defaults */
export function mergeConfigs(...configs: Config[]): Required<Config> {
    return defaults({}, ...configs, DEFAULT_CONFIG);
}

export async function loadConfig(config: Config, cwd: string = process.cwd()): Promise<LoadedConfig> {
    const merged = mergeConfigs(config);
    if(merged.files.length === 0 && merged.dirs.length === 0) {
        throw new UsageError('Either --file or --dir must be specified.');
    }
    const ignorePatterns = compileIgnorePatterns(merged.ignore);
    const warnings: string[] = [];

    const targets: string[] = [];
    for(const file of merged.files) {
        if(Path.extname(file) !== '.sol') {
            warnings.push(`Warning: ${file} does not have a .sol extension.`);
        }
        targets.push(Path.resolve(cwd, file));
    }
    for(const dir of merged.dirs) {
        const dirAbs = Path.resolve(cwd, dir);
        if(!fs.existsSync(dirAbs) || !fs.statSync(dirAbs).isDirectory()) {
            throw new UsageError(`Directory ${dir} does not exist`);
        }
        const found = await globby(SOLIDITY_GLOB, {cwd: dirAbs, absolute: true});
        targets.push(...found.sort());
    }

    return {
        ...merged,
        basedir: cwd,
        targetsGlobbedAbs: uniq(targets),
        rootAbs: Path.resolve(cwd, merged.root),
        ignorePatterns,
        warnings,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}
