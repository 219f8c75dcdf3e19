#!/usr/bin/env node
import cliProgress from 'cli-progress';
import fs from 'fs/promises';
import path from 'path';
import readline from 'readline';
import { SERVER_PORT } from './config';
import { EngineEntry, byName, engines } from './engines';
import { errorMessage } from './errors';
import { logger } from './logger';
import { Orchestrator } from './orchestrator';
import { startServer } from './server';
import { OrchestratorState, UnifiedResult } from './types';

const USAGE = `Usage: edgemeter [engine | all | serve] [--json] [--verbose] [--port n] [--dir path]

Engines: ${engines.map(entry => entry.id).join(', ')}`;

interface CliArgs {
  command?: string;
  json: boolean;
  verbose: boolean;
  port?: number;
  dir?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { json: false, verbose: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') args.json = true;
    else if (arg === '--verbose' || arg === '-v') args.verbose = true;
    else if (arg === '--port') args.port = Number(argv[++i]);
    else if (arg === '--dir') args.dir = argv[++i];
    else if (arg === '--help' || arg === '-h') args.command = 'help';
    else if (!args.command) args.command = arg;
    else throw new Error(`Unexpected argument: ${arg}`);
  }
  if (args.port !== undefined && !Number.isInteger(args.port)) {
    throw new Error('--port expects a number');
  }
  return args;
}

// Share of the bar each state covers: [from, to] in percent.
const STAGE_SPAN: Record<OrchestratorState, [number, number]> = {
  idle: [0, 0],
  discovering: [0, 5],
  'measuring-latency': [5, 10],
  downloading: [10, 55],
  uploading: [55, 100],
  done: [100, 100],
  cancelled: [100, 100],
};

function progressFor(state: OrchestratorState, elapsedMs: number, phaseMs: number): number {
  const [from, to] = STAGE_SPAN[state];
  const timed = state === 'downloading' || state === 'uploading';
  const fraction = timed ? Math.min(elapsedMs / phaseMs, 1) : 0;
  return Math.round(from + (to - from) * fraction);
}

async function runEngine(entry: EngineEntry, args: CliArgs): Promise<UnifiedResult> {
  const engine = entry.factory();
  const orchestrator = new Orchestrator();
  const phaseMs = engine.phaseDurationSeconds * 1000;

  const progressBar = args.json
    ? null
    : new cliProgress.SingleBar(
        {
          format: `${entry.title} | {bar} | {percentage}% | {stage} | DL {download} Mbps | UL {upload} Mbps`,
          barCompleteChar: '\u2588',
          barIncompleteChar: '\u2591',
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic,
      );

  let state: OrchestratorState = 'idle';
  let stateSince = Date.now();
  orchestrator.on('state', next => {
    state = next;
    stateSince = Date.now();
  });
  orchestrator.on('result', result => {
    progressBar?.update(progressFor(state, Date.now() - stateSince, phaseMs), {
      stage: result.status,
      download: result.downloadMbps.toFixed(1),
      upload: result.uploadMbps.toFixed(1),
    });
  });

  const onSigint = () => orchestrator.cancel();
  process.on('SIGINT', onSigint);
  progressBar?.start(100, 0, { stage: 'Starting', download: '0.0', upload: '0.0' });

  try {
    return await orchestrator.start(engine);
  } finally {
    process.removeListener('SIGINT', onSigint);
    progressBar?.stop();
  }
}

function formatMs(value: number | undefined): string {
  return value === undefined ? '-' : value.toFixed(1);
}

function printResult(result: UnifiedResult) {
  console.log(`\n${result.metadata.engine}: ${result.status}`);
  if (result.error) console.log(`  Error:    ${result.error}`);
  console.log(`  Download: ${result.downloadMbps.toFixed(2)} Mbps`);
  console.log(`  Upload:   ${result.uploadMbps.toFixed(2)} Mbps`);
  if (result.pingMs !== undefined) {
    console.log(`  Ping:     ${formatMs(result.pingMs)} ms (jitter ${formatMs(result.jitterMs)} ms)`);
  }
  for (const [key, value] of Object.entries(result.metadata)) {
    if (key !== 'engine') console.log(`  ${key}: ${value}`);
  }
}

function printTable(results: UnifiedResult[]) {
  const header = ['Engine', 'Status', 'Down (Mbps)', 'Up (Mbps)', 'Ping (ms)', 'Jitter (ms)'];
  const rows = results.map(result => [
    String(result.metadata.engine ?? ''),
    result.status,
    result.downloadMbps.toFixed(2),
    result.uploadMbps.toFixed(2),
    formatMs(result.pingMs),
    formatMs(result.jitterMs),
  ]);
  const widths = header.map((title, i) => Math.max(title.length, ...rows.map(row => row[i].length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ');

  console.log(`\n${line(header)}`);
  console.log(widths.map(width => '-'.repeat(width)).join('  '));
  rows.forEach(row => console.log(line(row)));
}

async function runAll(args: CliArgs): Promise<UnifiedResult[]> {
  const results: UnifiedResult[] = [];
  for (const entry of engines) {
    const result = await runEngine(entry, args);
    results.push(result);
    if (result.status === 'Cancelled') break;
  }
  return results;
}

async function serve(args: CliArgs) {
  const filesDir = path.resolve(args.dir ?? 'input_files');
  await fs.mkdir(filesDir, { recursive: true });
  const port = args.port ?? SERVER_PORT;
  const server = await startServer({ port, filesDir });
  console.log(`Target server running on port ${port}, serving files from ${filesDir}`);
  process.once('SIGINT', () => {
    console.log('\nShutting down target server');
    server.close();
  });
}

// A fresh interface per prompt, so Ctrl+C during a run reaches the SIGINT handler.
async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    return await new Promise<string>(resolve => rl.question(question, resolve));
  } finally {
    rl.close();
  }
}

async function interactive(args: CliArgs) {
  while (true) {
    console.log('Available engines:');
    engines.forEach((entry, index) => {
      console.log(`${index + 1}. ${entry.title}`);
    });

    const choice = await ask('Choose an engine (number): ');
    const selected = engines[parseInt(choice, 10) - 1];
    if (!selected) {
      console.log('Invalid choice. Please try again.');
      continue;
    }

    printResult(await runEngine(selected, args));

    const again = await ask('Do you want to run another engine? (y/n): ');
    if (again.toLowerCase() !== 'y') break;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.verbose) {
    logger.addListener(line => process.stderr.write(`${line}\n`));
  }

  if (args.command === 'help') {
    console.log(USAGE);
    return;
  }

  if (args.command === 'serve') {
    await serve(args);
    return;
  }

  if (args.command === 'all') {
    const results = await runAll(args);
    if (args.json) console.log(JSON.stringify(results, null, 2));
    else printTable(results);
    if (results.some(result => result.status === 'Error')) process.exitCode = 1;
    return;
  }

  if (args.command) {
    const entry = byName(args.command);
    if (!entry) {
      console.error(`Unknown engine: ${args.command}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    const result = await runEngine(entry, args);
    if (args.json) console.log(JSON.stringify(result, null, 2));
    else printResult(result);
    if (result.status === 'Error') process.exitCode = 1;
    return;
  }

  await interactive(args);
}

main().catch(error => {
  console.error(`edgemeter: ${errorMessage(error)}`);
  process.exit(1);
});
