import { afterEach, describe, it, expect } from 'vitest';
import fs from 'fs';
import Path from 'path';
import { Writable } from 'stream';
import { ExitCode, runCli } from './cli';
import { createProjectDir, lines, removeProjectDir } from './test-utils';

function capture() {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return {stream, text: () => chunks.join('')};
}

async function cli(options: Parameters<typeof runCli>[0], cwd: string) {
    const stdout = capture();
    const stderr = capture();
    const exitCode = await runCli(options, {stdout: stdout.stream, stderr: stderr.stream, cwd});
    return {exitCode, stdout: stdout.text(), stderr: stderr.text()};
}

describe('runCli', () => {
    let dir: string | undefined;
    afterEach(() => {
        if(dir) removeProjectDir(dir);
        dir = undefined;
    });

    it('exits 0 when unused functions are only reported', async () => {
        dir = createProjectDir({'A.sol': 'contract A { function dead() internal {} }'});
        const {exitCode, stdout, stderr} = await cli({files: ['A.sol']}, dir);
        expect(exitCode).toBe(ExitCode.Success);
        expect(stdout).toContain('dead: 0 occurrences\n');
        expect(stdout.endsWith('\nTotal unused functions found: 1\n')).toBe(true);
        expect(stderr).toBe('');
    });

    it('exits 2 on a configuration error', async () => {
        dir = createProjectDir({'A.sol': 'contract A {}'});
        const {exitCode, stderr} = await cli({}, dir);
        expect(exitCode).toBe(ExitCode.ConfigError);
        expect(stderr).toBe('error: Either --file or --dir must be specified.\n');
    });

    it('exits 2 on an invalid root', async () => {
        dir = createProjectDir({'A.sol': 'contract A {}'});
        const {exitCode, stderr} = await cli({files: ['A.sol'], root: 'missing'}, dir);
        expect(exitCode).toBe(ExitCode.ConfigError);
        expect(stderr).toBe(`error: Root directory ${Path.join(dir, 'missing')} does not exist or cannot be read\n`);
    });

    it('exits 1 when a file is malformed', async () => {
        dir = createProjectDir({'A.sol': 'contract A { function f() internal {'});
        const {exitCode, stderr} = await cli({dirs: ['.']}, dir);
        expect(exitCode).toBe(ExitCode.FileFailure);
        expect(stderr.endsWith('1 file(s) failed.\n')).toBe(true);
    });

    it('reads options from a config file and lets flags override them', async () => {
        dir = createProjectDir({
            'contracts/A.sol': lines(
                'contract A {',
                '    function _keep() internal {}',
                '    function drop() internal {}',
                '}',
                '',
            ),
            'vacuum.json': JSON.stringify({dirs: ['contracts'], root: 'contracts', ignore: ['^_'], delete: false}),
        });
        const {exitCode} = await cli({config: 'vacuum.json', delete: true}, dir);
        expect(exitCode).toBe(ExitCode.Success);
        expect(fs.readFileSync(Path.join(dir, 'contracts/A.sol'), 'utf8')).toBe(lines(
            'contract A {',
            '    function _keep() internal {}',
            '}',
            '',
        ));
    });
});
