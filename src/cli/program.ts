// src/cli/program.ts
import { parseArgs } from 'util';

import { type OptionContainer, SevenzipOptions } from '../core/options.js';
import { PresetRegistry } from '../core/presets.js';
import { DEFAULT_PRESETS, Sevenzip, type SevenzipConfig } from '../core/sevenzip.js';
import { Operation } from '../types/archive.types.js';
import { ArchiveError } from '../types/errors.types.js';
import { logger } from '../utils/logger.js';
import { askPassword } from '../utils/prompt.js';

//#region TYPES

/** Seams the CLI reaches the outside world through */
export interface CliDependencies {
    createJob: (config: SevenzipConfig) => Sevenzip;
    askPassword: (question: string) => Promise<string>;
    print: (line: string) => void;
    env: NodeJS.ProcessEnv;
    registry: PresetRegistry;
}

//#endregion

const EXECUTABLE_ENV = 'SEVENZIP_PATH';

/**
 * Runs one CLI invocation and returns the exit code.
 * Archive errors are reported and turned into exit code 1; anything else is rethrown.
 */
export async function runCli(argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
    const deps: CliDependencies = {
        createJob: config => new Sevenzip(config),
        askPassword: question => askPassword(question),
        print: line => console.log(line),
        env: process.env,
        registry: PresetRegistry.getInstance(),
        ...overrides,
    };

    const { values, positionals } = parseArgs({
        args: [...argv],
        options: {
            '7z': { type: 'string' },
            'preset': { type: 'string', short: 'p', multiple: true },
            'output': { type: 'string', short: 'o' },
            'ask-password': { type: 'boolean', default: false },
            'gui': { type: 'boolean' },
            'verbose': { type: 'boolean', short: 'v', default: false },
            'help': { type: 'boolean', short: 'h', default: false },
        },
        allowPositionals: true,
    });

    const [command, ...args] = positionals;
    if (values.help || command === undefined) {
        deps.print(HELP);
        return 0;
    }
    if (values.verbose) {
        logger.setLevel('debug');
    }

    if (command === 'presets') {
        deps.registry.listNames().forEach(name => deps.print(name));
        return 0;
    }

    try {
        const presets: (string | OptionContainer)[] = [...(values.preset ?? DEFAULT_PRESETS)];
        if (values['ask-password']) {
            presets.push(new SevenzipOptions().password(await deps.askPassword('Password: ')));
        }

        const job = deps.createJob({
            executablePath: values['7z'] ?? deps.env[EXECUTABLE_ENV],
            presets,
            registry: deps.registry,
            gui: values.gui,
        });

        return await dispatch(job, command, args, values.output, deps);
    } catch (error) {
        if (error instanceof ArchiveError) {
            logger.error(`${error.message} [${error.code}]`);
            return 1;
        }
        throw error;
    }
}

//#region COMMAND HANDLERS

async function dispatch(
    job: Sevenzip,
    command: string,
    args: string[],
    output: string | undefined,
    deps: CliDependencies
): Promise<number> {
    const [archive, ...files] = args;

    switch (command) {
        case 'args': {
            // Dry run: print the command line an operation would launch
            const [name = '', target, ...include] = args;
            const operation = toOperation(name);
            if (!operation) {
                return usage(`args <${Object.values(Operation).join('|')}> <archive> [files...]`, deps);
            }
            deps.print(job.buildArgs(operation, { archive: target, include, output }).join(' '));
            return 0;
        }
        case 'add':
            if (files.length === 0) {
                return usage('add <archive> <file1> [file2...]', deps);
            }
            return report(await job.add(files, { archive }).wait(), deps);
        case 'list':
            deps.print(job.list({ archive, include: files }));
            return 0;
        case 'extract':
            return report(await job.extract({ archive, include: files, output }).wait(), deps);
        case 'extractall':
            return report(await job.extractAll({ archive, include: files, output }).wait(), deps);
        case 'test':
            return report(await job.test({ archive, include: files }).wait(), deps);
        default:
            logger.error(`Unknown command: ${command}`);
            deps.print(HELP);
            return 1;
    }
}

function report(result: { stdout: string }, deps: CliDependencies): number {
    const text = result.stdout.trimEnd();
    if (text) {
        deps.print(text);
    }
    return 0;
}

function usage(line: string, deps: CliDependencies): number {
    deps.print(`Usage: ${line}`);
    return 1;
}

function toOperation(name: string): Operation | undefined {
    return Object.values(Operation).find(operation => operation === name);
}

//#endregion

const HELP = `
sevenzip-compose: run 7-Zip with composable presets

Usage: sevenzip-compose [options] <command> [args]

Commands:
  add <archive> <file1> [...]           Add files to an archive
  list <archive> [files...]             List archive contents
  extract <archive> [files...]          Extract files without their paths
  extractall <archive> [files...]       Extract files with full paths
  test <archive> [files...]             Test archive integrity
  presets                               List preset names
  args <operation> <archive> [...]      Print the command line without running it

Options:
  --7z <path>           7-Zip executable (default: $${EXECUTABLE_ENV}, then auto-detect)
  -p, --preset <name>   Preset to apply; repeat to merge in order (default: store)
  -o, --output <dir>    Output directory for extract operations (default: .)
  --ask-password        Prompt for the archive password
  --gui                 Use the 7-Zip GUI executable when available
  -v, --verbose         Log launched command lines
  -h, --help            Show this help message

Examples:
  sevenzip-compose -p ultra -p .mt4 add backup.7z ./docs
  sevenzip-compose -o ./out extractall backup.7z
  sevenzip-compose -p maximum args add backup.7z ./docs
`;
