#!/usr/bin/env node

import { Command, Option } from 'commander';
import { parseMilliseconds, parseRdfFormat } from './config.js';
import { errorMessage } from './errors.js';
import { DEFAULT_FORMAT } from './formats.js';
import { runConversion } from './run.js';

interface CliOptions {
  format: string;
  output?: string;
  marcxml?: boolean;
  marc?: boolean;
  config?: string;
  timeout?: string;
  stdinWait?: string;
  verbose: boolean;
  rules?: string;
  query?: string;
}

const program = new Command();

program
  .name('bf2marc')
  .description('Convert BIBFRAME RDF descriptions to MARC records')
  .version('0.1.0')
  .argument('[sources...]', 'RDF files or http(s) URLs; standard input when none are given')
  .option('-f, --format <name>', 'Input format: rdfxml, ntriples, turtle, rdfjson, nquads, trig', DEFAULT_FORMAT)
  .option('-o, --output <file>', 'Write records to a file instead of standard output')
  .addOption(new Option('--marcxml', 'Write a MARCXML collection (default)').conflicts('marc'))
  .addOption(new Option('--marc', 'Write binary MARC (ISO 2709)').conflicts('marcxml'))
  .option('-c, --config <file>', 'JSON configuration with dereference rules')
  .option('-t, --timeout <ms>', 'Timeout for each URL fetch and dereference lookup')
  .option('--stdin-wait <ms>', 'How long to wait for data on standard input (default: 2000)')
  .option('--rules <file>', 'Mapping rules to use instead of the bundled ones')
  .option('--query <file>', 'Description query to use instead of the bundled one')
  .option('-v, --verbose', 'Enable verbose output', false)
  .action(async (sources: string[], options: CliOptions) => {
    try {
      const startTime = Date.now();

      const { report, exitCode } = await runConversion(sources, {
        format: parseRdfFormat(options.format),
        outputFormat: options.marc ? 'marc' : 'marcxml',
        output: options.output,
        config: options.config,
        timeout: options.timeout === undefined ? undefined : parseMilliseconds(options.timeout, '--timeout'),
        stdinWait: options.stdinWait === undefined ? undefined : parseMilliseconds(options.stdinWait, '--stdin-wait'),
        verbose: options.verbose,
        rulesFile: options.rules,
        queryFile: options.query
      });

      if (options.verbose) {
        console.error(`\nDescriptions found: ${report.descriptions}`);
        console.error(`  - Converted: ${report.converted}`);
        console.error(`  - Without a record: ${report.empty}`);
        console.error(`  - Failed: ${report.failed}`);
        console.error(`Total execution time: ${Date.now() - startTime}ms`);
      }

      process.exitCode = exitCode;
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

program.addHelpText('after', `
Examples:
  $ bf2marc description.rdf > records.xml
  $ bf2marc -f turtle work.ttl instance.ttl -o records.xml
  $ bf2marc --marc -o records.mrc https://example.org/works/1.rdf
  $ cat dump.nt | bf2marc -f ntriples --verbose
  $ bf2marc -c dereference.json description.rdf -t 5000
`);

await program.parseAsync();
