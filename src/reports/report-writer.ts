import { writeFile } from 'node:fs/promises';
import { SUSPICIOUS_MARKERS } from '../pdf/pdf-validation.js';
import type { ResumeScanResult } from '../analysis/resume-scan.js';
import logger from '../lib/logger.js';

export interface TextReportInput {
  filePath: string;
  scan: ResumeScanResult;
  /** Message of an analysis failure; replaces the analysis section. */
  analysisError?: string;
  generatedAt?: Date;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

function bulletList(items: readonly string[]): string[] {
  if (items.length === 0) return ['  (none)'];
  return items.map((item) => `  - ${item}`);
}

function securitySection(scan: ResumeScanResult): string[] {
  const lines = ['--- Security Scan ---'];
  const flagged = SUSPICIOUS_MARKERS.filter((marker) => scan.suspiciousElements[marker] > 0);
  if (flagged.length === 0) {
    lines.push('No suspicious elements found. File is clean.');
  } else {
    lines.push('Suspicious PDF Elements Detected:');
    for (const marker of flagged) {
      lines.push(`  ${marker}: ${scan.suspiciousElements[marker]}`);
    }
  }
  return lines;
}

function keywordSection(scan: ResumeScanResult): string[] {
  return [
    '--- Keyword Analysis ---',
    `Word count: ${scan.keywords.word_count}`,
    `Unique words: ${scan.keywords.unique_words}`,
    'Top keywords:',
    ...scan.keywords.keywords.map(([word, count]) => `  ${word}: ${count}`),
  ];
}

function analysisSection(scan: ResumeScanResult, analysisError: string | undefined): string[] {
  const lines = ['--- AI Resume Analysis ---'];
  if (analysisError) {
    lines.push(`AI Analysis Error: ${analysisError}`);
    return lines;
  }
  if (scan.imageOnly || !scan.analysis) {
    lines.push('No text could be extracted from the PDF. It may contain only scanned images.');
    return lines;
  }

  const { record, source, model } = scan.analysis;
  lines.push(
    'Overall impression:',
    `  ${record.overall_impression}`,
    '',
    'Strengths:',
    ...bulletList(record.strengths),
    '',
    'Areas to improve:',
    ...bulletList(record.weaknesses),
    '',
    'Key skills:',
    ...bulletList(record.key_skills),
    '',
    'Recommendations:',
    ...bulletList(record.recommendations),
    '',
    source === 'model'
      ? `Analysis generated by ${model}.`
      : `The reply from ${model} could not be parsed; this is a heuristic analysis of the extracted text.`,
  );
  return lines;
}

export function formatTextReport(input: TextReportInput): string {
  const generatedAt = input.generatedAt ?? new Date();
  const sections = [
    [
      'Resume Scan Report',
      `Generated: ${formatTimestamp(generatedAt)}`,
      `Analyzed File: ${input.filePath}`,
    ],
    securitySection(input.scan),
    keywordSection(input.scan),
    analysisSection(input.scan, input.analysisError),
  ];
  return sections.map((lines) => lines.join('\n')).join('\n\n') + '\n';
}

export function defaultReportPath(filePath: string): string {
  return `${filePath}_report.txt`;
}

/** Writes the report as UTF-8 and returns the path written. */
export async function writeTextReport(input: TextReportInput, outputPath?: string): Promise<string> {
  const target = outputPath ?? defaultReportPath(input.filePath);
  await writeFile(target, formatTextReport(input), 'utf8');
  logger.info({ reportPath: target }, 'Report saved');
  return target;
}
