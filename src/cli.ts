import { Writable } from 'stream';
import { Config, loadConfig, mergeConfigs, readConfig } from './config';
import { runVacuum } from './analyze';
import { VacuumError } from './errors';
import { createUi } from './ui';

export interface CliOptions extends Config {
    /** Config file; command-line flags take precedence over it */
    config?: string;
    /** Show a live progress readout while analyzing */
    progress?: boolean;
}

export interface CliIo {
    stdout: Writable;
    stderr: Writable;
    cwd?: string;
}

export enum ExitCode {
    Success = 0,
    /** At least one file was malformed or could not be read or written */
    FileFailure = 1,
    /** Bad root, bad ignore pattern, bad flags; nothing was analyzed */
    ConfigError = 2,
}

export async function runCli(options: CliOptions, io: CliIo): Promise<ExitCode> {
    const cwd = io.cwd ?? process.cwd();
    const {config: configPath, progress, ...cliConfig} = options;
    const print = (stream: Writable) => (line: string) => { stream.write(`${line}\n`); };

    const ui = progress ? createUi() : undefined;
    const buffered: string[] = [];
    try {
        const fileConfig = configPath ? readConfig(configPath, cwd) : {};
        const config = await loadConfig(mergeConfigs(cliConfig, fileConfig), cwd);

        ui?.start();
        const result = await runVacuum(config, {
            // While the live readout owns the terminal, hold the report back until it is gone
            log: ui ? line => { ui.state.log(line); buffered.push(line); } : print(io.stdout),
            logError: print(io.stderr),
            ui,
        });
        ui?.stop();
        buffered.forEach(print(io.stdout));
        return result.failures.length > 0 ? ExitCode.FileFailure : ExitCode.Success;
    } catch(e: unknown) {
        ui?.stop();
        buffered.forEach(print(io.stdout));
        if(e instanceof VacuumError && e.isFatal) {
            print(io.stderr)(`error: ${e.message}`);
            return ExitCode.ConfigError;
        }
        throw e;
    }
}
