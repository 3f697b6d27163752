import type { ProgressSnapshot } from '../progress/progressTracker.js';
import type { JobOutcome } from '../types.js';

let progressLastLength = 0;
let progressRendered = false;
let lastRenderedLine: string | undefined;

/** Rewrites the single progress line in place; identical lines are skipped. */
export function writeProgress(snapshot: ProgressSnapshot): void {
  const line = padProgressLine(renderProgressLine(snapshot));
  if (line === lastRenderedLine) {
    return;
  }

  process.stdout.write(`\r${line}`);
  progressLastLength = line.length;
  progressRendered = true;
  lastRenderedLine = line;
}

export function writeSummary(outcome: JobOutcome, durationMs: number): void {
  flushProgress({ persist: true });
  process.stdout.write(renderOutcomeSummary(outcome, durationMs));
}

export function logError(message: string): void {
  flushProgress();
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function flushProgress(options: { persist?: boolean } = {}): void {
  if (!progressRendered) {
    return;
  }

  if (options.persist) {
    process.stdout.write('\n');
  } else if (progressLastLength > 0) {
    process.stdout.write(`\r${' '.repeat(progressLastLength)}\r`);
  }

  progressRendered = false;
  progressLastLength = 0;
  lastRenderedLine = undefined;
}

export function renderProgressLine(snapshot: ProgressSnapshot): string {
  const percent = String(Math.round(snapshot.progress)).padStart(3, ' ');
  return `[${percent}%] ${snapshot.status}: ${snapshot.message}`;
}

export function renderOutcomeSummary(outcome: JobOutcome, durationMs: number): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Job: ${outcome.jobId}`,
    `State: ${outcome.state}`,
  ];

  if (outcome.sourceId) {
    lines.push(`Source: ${outcome.sourceId}`);
  }

  if (outcome.summary) {
    const { summary } = outcome;
    lines.push(
      `Crawl type: ${summary.crawlType}`,
      `Documents processed: ${summary.processed}/${summary.total}`,
      `Chunks stored: ${summary.chunks}`,
      `Code examples: ${summary.codeExamples}`,
    );
  }

  if (outcome.error) {
    lines.push(`Error: ${outcome.error}`);
  }

  lines.push(`Duration: ${formatDuration(durationMs)} (${Math.round(durationMs)} ms)`);
  return `${lines.join('\n')}\n`;
}

function padProgressLine(text: string): string {
  if (progressLastLength > text.length) {
    return `${text}${' '.repeat(progressLastLength - text.length)}`;
  }

  return text;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
