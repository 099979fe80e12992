#!/usr/bin/env node
import { Builtins, Cli, Command, Option } from 'clipanion';
import { runCli } from './cli';

class VacuumCommand extends Command {
    static paths = [['vacuum'], Command.Default];

    static usage = Command.Usage({
        description: 'Finds unused functions within a Solidity project, and optionally removes them.',
        examples: [
            ['Report unused functions in every contract', '$0 --dir contracts'],
            ['Remove them, keeping test helpers and anything starting with an underscore', '$0 --dir contracts --delete --ignore ^test --ignore ^_'],
        ],
    });

    file = Option.Array('--file', {description: 'Path to a specific Solidity file to analyze.'});
    dir = Option.Array('--dir', {description: 'Directory containing Solidity files to analyze.'});
    root = Option.String('--root', {description: 'Root directory to search for function occurrences. Defaults to the current directory.'});
    shouldDelete = Option.Boolean('--delete', {description: 'Remove unused functions from the Solidity file(s).'});
    ignore = Option.Array('--ignore', {description: "Pattern for function names to ignore, e.g. '^test'. Replaces the default ^test."});
    includePublic = Option.Boolean('--include-public', {description: 'Also report public, external and override functions.'});
    verbose = Option.Boolean('--verbose', {description: 'List every reference found.'});
    config = Option.String('--config', {description: 'JSON or JS config file.'});
    progress = Option.Boolean('--progress', false, {description: 'Show a live progress readout.'});

    async execute() {
        return runCli({
            files: this.file,
            dirs: this.dir,
            root: this.root,
            delete: this.shouldDelete,
            ignore: this.ignore,
            includePublic: this.includePublic,
            verbose: this.verbose,
            config: this.config,
            progress: this.progress,
        }, this.context);
    }
}

const cli = new Cli({
    binaryLabel: 'Solidity unused function finder',
    binaryName: 'sol-vacuum',
    binaryVersion: '0.1.0',
});
cli.register(VacuumCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

cli.runExit(process.argv.slice(2)).catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
});
