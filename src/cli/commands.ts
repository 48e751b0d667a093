import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { loadToolPaths, toolEnvVar } from '../control-plane/config.js';
import { DEFAULT_EXTRA_RUNS, DEFAULT_MAX_RUNS, runPipeline } from '../control-plane/orchestrator.js';
import { TOOL_NAMES } from '../control-plane/types.js';
import type { DriverConfig, JobInput, JobSource } from '../control-plane/types.js';
import { summarizeLedger } from '../ledger/ledger.js';
import { createConsoleLogger } from '../utils/logger.js';

export interface BuildCommandOptions {
  format?: string;
  output?: string;
  outputDir: string;
  maxRuns: number;
  extraRuns: number;
  indexStyle?: string;
  indexOptions?: string;
  tmpdir?: string;
  searchPath: string[];
  timeout?: number;
  ledger?: string;
  debug?: boolean;
}

function parseCount(value: string): number {
  return parseInt(value, 10);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function toJobInput(source: JobSource, opts: BuildCommandOptions): JobInput {
  return {
    source,
    format: opts.format,
    output: opts.output,
    outputDir: opts.outputDir,
    maxRuns: opts.maxRuns,
    extraRuns: opts.extraRuns,
    indexStyle: opts.indexStyle,
    indexOptions: opts.indexOptions,
    tmpdir: opts.tmpdir,
    searchPaths: opts.searchPath,
    timeoutMs: opts.timeout,
  };
}

/** True when the document will be printed rather than written to a file. */
export function writesToStdout(opts: Pick<BuildCommandOptions, 'output'>): boolean {
  return opts.output === undefined || !/\.\w+$/.test(opts.output);
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('texloop')
    .description(
      'Runs latex, bibtex, makeindex and the format converters until the document stops changing.\n\n' +
      'Tool locations come from TEXLOOP_<TOOL> environment variables (a .env file is read).'
    )
    .version('0.1.0');

  program
    .command('build')
    .description('Format a LaTeX document')
    .argument('<source>', 'LaTeX source file, or - to read standard input')
    .option('--format <format>', 'Output format: dvi, ps, pdf, pdf(ps), ps2pdf or pdf(dvi)')
    .option('--output <name>', 'Output file name (its extension picks the format), or a bare format name')
    .option('--output-dir <path>', 'Directory the output file is written to', '.')
    .option('--max-runs <n>', 'Maximum formatter runs', parseCount, DEFAULT_MAX_RUNS)
    .option('--extra-runs <n>', 'Formatter runs after the document stabilizes', parseCount, DEFAULT_EXTRA_RUNS)
    .option('--index-style <style>', 'makeindex style file (-s)')
    .option('--index-options <opts>', 'Extra makeindex options')
    .option('--tmpdir <dir>', 'Persistent working directory, kept after the run')
    .option('-I, --search-path <dir>', 'Add a directory to TEXINPUTS and friends (repeatable)', collect, [])
    .option('--timeout <ms>', 'Kill any single tool that runs longer than this', parseCount)
    .option('--ledger <path>', 'Write a JSON record of the run to this file')
    .option('--debug', 'Print debug output')
    .action(async (sourceArg: string, opts: BuildCommandOptions) => {
      const source: JobSource =
        sourceArg === '-' ? { text: await readStdin() } : { path: sourceArg };
      const toStdout = writesToStdout(opts);

      const config: DriverConfig = {
        tools: loadToolPaths(),
        logger: createConsoleLogger({ debug: opts.debug === true, infoToStderr: toStdout }),
        platform: process.platform,
      };

      const result = await runPipeline(toJobInput(source, opts), config);

      if (opts.ledger) {
        await writeFile(opts.ledger, JSON.stringify(result.ledger, null, 2));
      }
      for (const line of summarizeLedger(result.ledger)) {
        config.logger.debug(line);
      }

      if (!result.ok) {
        console.error(`texloop: ${result.error.message}`);
        if (result.error.log && !result.error.message.includes(result.error.log)) {
          console.error(result.error.log);
        }
        process.exitCode = 2;
        return;
      }

      if (result.output.kind === 'bytes') {
        process.stdout.write(result.output.data);
      } else {
        config.logger.info(`\n[texloop] done. Output written to ${result.output.path}`);
      }
    });

  program
    .command('tools')
    .description('Show the configured tool locations')
    .action(() => {
      const tools = loadToolPaths();
      for (const tool of TOOL_NAMES) {
        const path = tools[tool] ?? '(not configured)';
        console.log(`  ${tool.padEnd(10)} ${path.padEnd(28)} ${toolEnvVar(tool)}`);
      }
    });

  return program;
}
