#!/usr/bin/env node

/**
 * dirpack CLI
 *
 * Bundle a directory's text files (optionally only those changed between two
 * commits, with their patches, or model-written summaries of them) into one
 * prompt-ready document.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, type CliConfig } from './config/config.js';
import { runBundleCommand, toRawRunOptions, type BundleFlags } from './commands/bundle.js';
import { errorMessage } from './errors.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
    .name('dirpack')
    .description('Bundle matching files from a directory into a single prompt-ready document')
    .version(pkg.version);

/**
 * Bundle command - select, assemble, deliver
 */
program
    .command('bundle')
    .description('Bundle files into one document (written to a file or the clipboard)')
    .argument('[suffixes]', 'Comma-separated extensions or file names, or "*" for every text file')
    .argument('[directory]', 'Directory to bundle (default: current directory)')
    .option('-o, --output-path <file>', 'Write to this file instead of the clipboard')
    .option('-t, --prompt-template-path <file>', 'Template containing ${${CONTENT}$}$ to wrap the bundle in')
    .option('--dont-use-gitignore', 'Also include files ignored by .gitignore (.ignore files and .git/info/exclude still apply)')
    .option('--no-hidden', 'Skip hidden files and directories')
    .option('--exclude-paths <paths>', 'Comma-separated path prefixes to leave out')
    .option('--include-paths <paths>', 'Comma-separated path prefixes to keep (others are left out)')
    .option('--or-keywords <words>', 'Keep files containing at least one of these')
    .option('--and-keywords <words>', 'Keep files containing all of these')
    .option('--exclude-keywords <words>', 'Leave out files containing any of these')
    .option('--diff-only', 'Only files changed in the commit range, each followed by its diff')
    .option('--start-commit <ref>', 'Start of the commit range (requires --diff-only)')
    .option('--end-commit <ref>', 'End of the commit range (default: working tree)')
    .option('--summarize', 'Replace file contents with a model-written summary of each file (or of its diff)')
    .option('--apply', 'Also write each summary as a comment block at the top of its file (requires --summarize)')
    .option('--model <id>', 'Model for --summarize (default: DIRPACK_MODEL or openai/gpt-4o-mini)')
    .option('--api-key <key>', 'API key for --summarize (default: DIRPACK_API_KEY / OPENROUTER_API_KEY)')
    .option('--no-cache', 'Always call the model, skipping the response cache')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (suffixes: string | undefined, directory: string | undefined, options: BundleFlags, command: Command) => {
        try {
            // Priority: CLI flags > config file > hardcoded defaults
            let config: CliConfig = {};
            if (options.configPath) {
                config = loadConfig(options.configPath);
            }

            const raw = toRawRunOptions(
                suffixes,
                directory,
                options,
                config,
                (name) => command.getOptionValueSource(name) === 'cli'
            );

            if (raw.verbose && options.configPath) {
                console.log(`Config: ${resolve(options.configPath)}`);
            }

            const { message } = await runBundleCommand(raw);
            console.log(message);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Init command - write a starter config
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'dirpack.config.json')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: dirpack bundle --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

await program.parseAsync();
