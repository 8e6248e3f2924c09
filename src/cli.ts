#!/usr/bin/env node
/**
 * highlight-reel command line
 *
 *   highlight-reel export <project.json> [--out <dir>] [--concurrency N] [--timeout-ms N] [--gap-speed X] [--gaps] [--debug]
 *   highlight-reel plan <project.json> [--gap-speed X] [--gaps]
 *   highlight-reel probe <video>...
 *
 * Exit codes: 0 success, 2 partial (a unit failed, assembly did not run, or cancelled), 1 fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { formatChapterLines, formatCommentLines } from './services/annotations';
import { handlePlan, handleProbe, handleStartExport } from './handlers/export-handler';
import { parseRequest } from './handlers/handlers';
import { projectSchema, ProjectPayload } from './handlers/schemas';
import { COMMANDS, ErrorResponse, ExportResult, ExportWarning, isErrorResponse } from './types/export';
import { OutputPlan } from './types/plan';
import { ConfigOverrides, loadConfig } from './utils/config';
import { ConfigError } from './utils/errors';
import { setDebugLogging } from './utils/logger';
import { f, toTimestamp } from './utils/timecode';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export const USAGE = [
  'Usage:',
  '  highlight-reel export <project.json> [--out <dir>] [--concurrency N] [--timeout-ms N] [--gap-speed X] [--gaps] [--debug]',
  '  highlight-reel plan <project.json> [--gap-speed X] [--gaps]',
  '  highlight-reel probe <video>...',
].join('\n');

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

class UsageError extends Error {}

function numberOption(name: string, raw: string | undefined, integer: boolean): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`expected ${integer ? 'an integer' : 'a number'}, got "${raw}"`, `--${name}`);
  }
  return value;
}

/** Read a project file; relative video paths are taken from the file's directory */
export function readProjectFile(projectPath: string): ProjectPayload {
  const absolute = path.resolve(projectPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolute, 'utf8'));
  } catch (e) {
    throw new UsageError(`Could not read ${absolute}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const project = parseRequest(projectSchema, raw);
  const baseDir = path.dirname(absolute);
  return {
    ...project,
    videos: project.videos.map((v) => ({ ...v, path: path.resolve(baseDir, v.path) })),
  };
}

function withGapFlags(project: ProjectPayload, gaps: boolean, gapSpeed: number | undefined): ProjectPayload {
  if (!gaps && gapSpeed === undefined) return project;
  return {
    ...project,
    gapPolicy: {
      enabled: gaps || (project.gapPolicy?.enabled ?? false),
      speed: gapSpeed ?? project.gapPolicy?.speed,
    },
  };
}

function printWarnings(warnings: readonly ExportWarning[], io: CliIO): void {
  for (const w of warnings) io.stderr(`warning ${w.code}: ${w.message}`);
}

function printError(response: ErrorResponse, io: CliIO): void {
  io.stderr(`error${response.code ? ` ${response.code}` : ''}: ${response.error}`);
  if (response.code === 'INVALID_REQUEST' && response.details) io.stderr(response.details);
}

export function formatPlan(plan: OutputPlan): string[] {
  return plan.units.map((u) => {
    const what = u.kind === 'keep' ? `"${u.label}"` : `gap ${u.gapNumber}`;
    return `#${u.index} ${u.kind.padEnd(4)} ${u.videoId} [${f(u.sourceStart)}, ${f(u.sourceEnd)}) x${f(u.speed)} -> ${toTimestamp(u.outStart)} +${u.outDuration.toFixed(3)}s ${what}`;
  });
}

function printReport(result: ExportResult, io: CliIO): void {
  io.stdout(`Export ${result.status}: ${result.exportDir}`);
  io.stdout(`  highlights: ${result.artifacts.highlights ?? '(not written)'}`);
  io.stdout(`  clips:      ${result.artifacts.clips.length}`);
  io.stdout(`  chapters:   ${result.artifacts.chapters}`);
  io.stdout(`  comments:   ${result.artifacts.comments}`);
  io.stdout(`  log:        ${result.artifacts.log}`);
  if (result.artifacts.workDir) io.stdout(`  work dir:   ${result.artifacts.workDir}`);
  for (const job of result.jobs.filter((j) => j.status === 'failed' || j.status === 'timed-out')) {
    const tail = job.stderr.split('\n').filter(Boolean).slice(-3).join(' | ');
    io.stderr(`unit #${job.unit} ${job.label}: ${job.status} (exit ${job.exitCode ?? job.signal ?? 'n/a'}) ${tail}`);
  }
  if (result.concat.reason) io.stdout(`  assembly:   ${result.concat.status} (${result.concat.reason})`);
  printWarnings(result.warnings, io);
}

function parseCli(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        out: { type: 'string', short: 'o' },
        concurrency: { type: 'string' },
        'timeout-ms': { type: 'string' },
        'gap-speed': { type: 'string' },
        gaps: { type: 'boolean' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

export async function main(argv: string[], io: CliIO = defaultIO, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const { values, positionals } = parseCli(argv);
    const [command, ...rest] = positionals;

    if (values.help === true) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    const overrides: ConfigOverrides = {
      concurrency: numberOption('concurrency', values.concurrency, true),
      jobTimeoutMs: numberOption('timeout-ms', values['timeout-ms'], true),
      gapSpeed: numberOption('gap-speed', values['gap-speed'], false),
      debug: values.debug === true ? true : undefined,
    };
    const config = loadConfig({ env, overrides });
    setDebugLogging(config.debug);

    switch (command) {
      case COMMANDS.PLAN: {
        if (rest.length !== 1) throw new UsageError('plan takes exactly one project file');
        const project = withGapFlags(readProjectFile(rest[0]), values.gaps === true, overrides.gapSpeed);
        const response = await handlePlan({ project }, config);
        if (isErrorResponse(response)) {
          printError(response, io);
          return EXIT_FATAL;
        }
        io.stdout(`${response.plan.units.length} unit(s), ${response.plan.totalDuration.toFixed(3)}s of output`);
        formatPlan(response.plan).forEach((line) => io.stdout(line));
        io.stdout('Chapters:');
        formatChapterLines(response.annotations.chapters).forEach((line) => io.stdout(`  ${line}`));
        io.stdout('Comments:');
        formatCommentLines(response.annotations.comments).forEach((line) => io.stdout(`  ${line}`));
        printWarnings(response.warnings, io);
        return EXIT_OK;
      }

      case COMMANDS.EXPORT: {
        if (rest.length !== 1) throw new UsageError('export takes exactly one project file');
        const project = withGapFlags(readProjectFile(rest[0]), values.gaps === true, overrides.gapSpeed);
        const exportDir = path.resolve(values.out ?? path.join(path.dirname(path.resolve(rest[0])), 'exports'));

        const controller = new AbortController();
        const onSigint = () => {
          io.stderr('Cancelling export...');
          controller.abort();
        };
        process.once('SIGINT', onSigint);
        try {
          const response = await handleStartExport(
            { project, exportDir },
            {
              config,
              signal: controller.signal,
              callbacks: {
                onJobEnd: (record, completed, total) =>
                  io.stdout(`[${completed}/${total}] ${record.label}: ${record.status}`),
                onConcatStart: () => io.stdout('Assembling highlights...'),
              },
            }
          );
          if (isErrorResponse(response)) {
            printError(response, io);
            return EXIT_FATAL;
          }
          printReport(response.result, io);
          const { status } = response.result;
          return status === 'succeeded' || status === 'empty' ? EXIT_OK : EXIT_PARTIAL;
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      }

      case COMMANDS.PROBE: {
        if (rest.length === 0) throw new UsageError('probe takes at least one video file');
        const response = await handleProbe({ paths: rest });
        if (isErrorResponse(response)) {
          printError(response, io);
          return EXIT_FATAL;
        }
        io.stdout(JSON.stringify({ videos: response.videos }, null, 2));
        for (const failure of response.failed) io.stderr(`failed ${failure.path}: ${failure.error}`);
        if (response.videos.length === 0) return EXIT_FATAL;
        return response.failed.length > 0 ? EXIT_PARTIAL : EXIT_OK;
      }

      default:
        throw new UsageError(command ? `Unknown command "${command}"` : 'Missing command');
    }
  } catch (e) {
    io.stderr(`error: ${e instanceof Error ? e.message : String(e)}`);
    if (e instanceof UsageError) io.stderr(USAGE);
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = EXIT_FATAL;
    }
  );
}
