#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { ResumeAnalyzer } from './analysis/resume-analyzer.js';
import {
  analyzeExtractedResume,
  extractResumeFile,
  type ResumeScanResult,
} from './analysis/resume-scan.js';
import { loadConfig, type AppConfig } from './lib/config.js';
import { isAnalysisError } from './lib/errors.js';
import logger from './lib/logger.js';
import { OllamaClient, type ModelClient } from './lib/ollama-client.js';
import { writeTextReport } from './reports/report-writer.js';

const USAGE = 'Usage: resume-scan <file.pdf> [--report <path>] [--json] [--max-words <n>]';

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface CliDeps {
  config?: AppConfig;
  client?: ModelClient;
  io?: CliIo;
}

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

export function formatSummary(scan: ResumeScanResult): string {
  const lines = [`File: ${scan.fileName} (${scan.sizeBytes} bytes)`];
  lines.push(`Words: ${scan.keywords.word_count}, unique: ${scan.keywords.unique_words}`);
  if (!scan.analysis) {
    lines.push('No text could be extracted from the PDF. It may contain only scanned images.');
    return lines.join('\n');
  }
  const { record, source } = scan.analysis;
  lines.push('', record.overall_impression, '');
  lines.push(`Strengths: ${record.strengths.join('; ')}`);
  lines.push(`Areas to improve: ${record.weaknesses.join('; ')}`);
  lines.push(`Key skills: ${record.key_skills.join(', ')}`);
  lines.push(`Recommendations: ${record.recommendations.join('; ')}`);
  if (source === 'fallback') lines.push('', '(Heuristic analysis: the model reply could not be parsed.)');
  return lines.join('\n');
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      report: { type: 'string' },
      json: { type: 'boolean', default: false },
      'max-words': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const filePath = positionals[0];
  if (!filePath || positionals.length > 1) {
    io.err(USAGE);
    return 1;
  }

  let maxWords: number | undefined;
  if (values['max-words'] !== undefined) {
    maxWords = Number(values['max-words']);
    if (!Number.isInteger(maxWords) || maxWords <= 0) {
      io.err(`--max-words must be a positive integer, got "${values['max-words']}"`);
      return 1;
    }
  }

  try {
    const config = deps.config ?? loadConfig();
    const client = deps.client ?? new OllamaClient({ baseUrl: config.ollama.baseUrl, model: config.ollama.model });
    const analyzer = new ResumeAnalyzer({ config, client });

    const extracted = await extractResumeFile(filePath, config);

    let scan: ResumeScanResult;
    try {
      scan = await analyzeExtractedResume(extracted, { config, analyzer }, { maxWords });
    } catch (err) {
      if (!isAnalysisError(err)) throw err;
      const reportPath = await writeTextReport(
        { filePath, scan: { ...extracted, analysis: null }, analysisError: err.message },
        values.report,
      );
      io.err(`Error: ${err.message}`);
      io.err(`Report saved to: ${reportPath}`);
      return 1;
    }

    const reportPath = await writeTextReport({ filePath, scan }, values.report);

    if (values.json) {
      io.out(JSON.stringify({ ...scan, text: undefined, report_path: reportPath }, null, 2));
    } else {
      io.out(formatSummary(scan));
      io.out(`\nReport saved to: ${reportPath}`);
    }
    return 0;
  } catch (err) {
    if (isAnalysisError(err)) {
      io.err(`Error: ${err.message}`);
    } else {
      logger.error({ err }, 'Unexpected failure');
      io.err(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // npm installs the bin as a symlink
    return realpathSync(path.resolve(entry)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.fatal({ err }, 'resume-scan crashed');
      process.exitCode = 1;
    });
}
